import { Tlbr } from '../../types';

export type Assignment = [row: number, col: number];

export interface AssignmentResult {
  matches: Assignment[];
  unmatchedRows: number[];
  unmatchedCols: number[];
}

const PAD_COST = 1e9;

/**
 * Calculate IoU between two boxes in tlbr format. Zero-area or disjoint
 * boxes give 0.
 */
export function iou(box1: Tlbr, box2: Tlbr): number {
  const [x1_1, y1_1, x2_1, y2_1] = box1;
  const [x1_2, y1_2, x2_2, y2_2] = box2;

  const xi1 = Math.max(x1_1, x1_2);
  const yi1 = Math.max(y1_1, y1_2);
  const xi2 = Math.min(x2_1, x2_2);
  const yi2 = Math.min(y2_1, y2_2);

  const interArea = Math.max(0, xi2 - xi1) * Math.max(0, yi2 - yi1);

  const box1Area = Math.max(0, x2_1 - x1_1) * Math.max(0, y2_1 - y1_1);
  const box2Area = Math.max(0, x2_2 - x1_2) * Math.max(0, y2_2 - y1_2);

  const unionArea = box1Area + box2Area - interArea;

  return unionArea > 0 ? interArea / unionArea : 0;
}

/**
 * 1 - IoU cost matrix, one row per box in `rows`, one column per box in `cols`.
 */
export function iouDistance(rows: Tlbr[], cols: Tlbr[]): number[][] {
  return rows.map(a => cols.map(b => 1 - iou(a, b)));
}

/**
 * Minimum-cost bipartite assignment. Rectangular matrices are padded, so
 * excess rows or columns simply stay unmatched. Returns pairs ordered by row.
 */
export function assign(costMatrix: number[][]): Assignment[] {
  const nRows = costMatrix.length;
  const nCols = nRows > 0 ? costMatrix[0].length : 0;
  if (nRows === 0 || nCols === 0) {
    return [];
  }

  const size = Math.max(nRows, nCols);
  const padded: number[][] = Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => (i < nRows && j < nCols ? costMatrix[i][j] : PAD_COST))
  );

  const assignment = hungarian(padded);
  const pairs: Assignment[] = [];
  for (let i = 0; i < nRows; i++) {
    const j = assignment[i];
    if (j >= 0 && j < nCols) {
      pairs.push([i, j]);
    }
  }
  return pairs;
}

/**
 * Assignment followed by gating: solver pairs costing more than `maxCost`
 * are split back into unmatched rows and columns.
 */
export function linearAssignment(costMatrix: number[][], nCols: number, maxCost: number): AssignmentResult {
  const matches: Assignment[] = [];
  const matchedRows = new Set<number>();
  const matchedCols = new Set<number>();

  for (const [i, j] of assign(costMatrix)) {
    if (costMatrix[i][j] <= maxCost) {
      matches.push([i, j]);
      matchedRows.add(i);
      matchedCols.add(j);
    }
  }

  const unmatchedRows: number[] = [];
  for (let i = 0; i < costMatrix.length; i++) {
    if (!matchedRows.has(i)) unmatchedRows.push(i);
  }
  const unmatchedCols: number[] = [];
  for (let j = 0; j < nCols; j++) {
    if (!matchedCols.has(j)) unmatchedCols.push(j);
  }

  return { matches, unmatchedRows, unmatchedCols };
}

/**
 * Minimum-cost perfect matching on a square matrix, returning the column of
 * each row. Shortest augmenting paths over row and column potentials; rows
 * are inserted in index order and ties go to the lowest column.
 */
function hungarian(cost: number[][]): number[] {
  const size = cost.length;

  // 1-based; column 0 is the virtual root of each augmenting path
  const rowPotential = new Array<number>(size + 1).fill(0);
  const colPotential = new Array<number>(size + 1).fill(0);
  const rowOfCol = new Array<number>(size + 1).fill(0);
  const previousCol = new Array<number>(size + 1).fill(0);

  for (let row = 1; row <= size; row++) {
    rowOfCol[0] = row;
    let col = 0;
    const slack = new Array<number>(size + 1).fill(Infinity);
    const visited = new Array<boolean>(size + 1).fill(false);

    // Grow the alternating tree until it reaches a free column
    while (rowOfCol[col] !== 0) {
      visited[col] = true;
      const current = rowOfCol[col];
      let step = Infinity;
      let nextCol = 0;

      for (let c = 1; c <= size; c++) {
        if (visited[c]) continue;
        const reduced = cost[current - 1][c - 1] - rowPotential[current] - colPotential[c];
        if (reduced < slack[c]) {
          slack[c] = reduced;
          previousCol[c] = col;
        }
        if (slack[c] < step) {
          step = slack[c];
          nextCol = c;
        }
      }

      for (let c = 0; c <= size; c++) {
        if (visited[c]) {
          rowPotential[rowOfCol[c]] += step;
          colPotential[c] -= step;
        } else {
          slack[c] -= step;
        }
      }
      col = nextCol;
    }

    // Flip the path back to the root
    while (col !== 0) {
      const prev = previousCol[col];
      rowOfCol[col] = rowOfCol[prev];
      col = prev;
    }
  }

  const colOfRow = new Array<number>(size).fill(-1);
  for (let c = 1; c <= size; c++) {
    if (rowOfCol[c] !== 0) {
      colOfRow[rowOfCol[c] - 1] = c - 1;
    }
  }
  return colOfRow;
}
