import { Tlbr } from '../../types';

export type Vector = number[];
export type Matrix = number[][];

const STATE_DIM = 8;
const MEASUREMENT_DIM = 4;

/**
 * Constant-velocity Kalman filter over box state
 * [cx, cy, a, h, vcx, vcy, va, vh], where cx,cy is the box center,
 * a the aspect ratio (w / h) and h the height. Noise scales with box height.
 */
export class KalmanFilter {
  private motionMat: Matrix;
  private updateMat: Matrix;
  private stdWeightPosition: number;
  private stdWeightVelocity: number;

  constructor() {
    // Motion matrix (F): position += velocity each frame
    this.motionMat = eye(STATE_DIM);
    for (let i = 0; i < MEASUREMENT_DIM; i++) {
      this.motionMat[i][MEASUREMENT_DIM + i] = 1;
    }

    // Measurement matrix (H)
    this.updateMat = Array.from({ length: MEASUREMENT_DIM }, (_, i) =>
      Array.from({ length: STATE_DIM }, (_, j) => (i === j ? 1 : 0))
    );

    this.stdWeightPosition = 1.0 / 20;
    this.stdWeightVelocity = 1.0 / 160;
  }

  /**
   * Create an unassociated track state from a box.
   */
  initiate(measurement: Tlbr): [Vector, Matrix] {
    const [cx, cy, a, h] = toMeasurement(measurement);
    const mean = [cx, cy, a, h, 0, 0, 0, 0];

    const std = [
      2 * this.stdWeightPosition * h,
      2 * this.stdWeightPosition * h,
      1e-2,
      2 * this.stdWeightPosition * h,
      10 * this.stdWeightVelocity * h,
      10 * this.stdWeightVelocity * h,
      1e-5,
      10 * this.stdWeightVelocity * h
    ];

    return [mean, diag(std.map(s => s * s))];
  }

  /**
   * Advance the state one frame.
   */
  predict(mean: Vector, covariance: Matrix): [Vector, Matrix] {
    // x' = F * x
    const predictedMean = matVec(this.motionMat, mean);

    // P' = F * P * F^T + Q
    const predictedCovariance = matMul(matMul(this.motionMat, covariance), transpose(this.motionMat));

    const h = predictedMean[3];
    const std = [
      this.stdWeightPosition * h,
      this.stdWeightPosition * h,
      1e-2,
      this.stdWeightPosition * h,
      this.stdWeightVelocity * h,
      this.stdWeightVelocity * h,
      1e-5,
      this.stdWeightVelocity * h
    ];
    for (let i = 0; i < STATE_DIM; i++) {
      predictedCovariance[i][i] += std[i] * std[i];
    }

    return [predictedMean, predictedCovariance];
  }

  /**
   * Standard Kalman correction with a measured box.
   */
  update(mean: Vector, covariance: Matrix, measurement: Tlbr): [Vector, Matrix] {
    const meas = toMeasurement(measurement);

    // Innovation: y = z - H * x
    const projected = matVec(this.updateMat, mean);
    const innovation = meas.map((m, i) => m - projected[i]);

    // S = H * P * H^T + R
    const S = matMul(matMul(this.updateMat, covariance), transpose(this.updateMat));
    const std = [
      this.stdWeightPosition * mean[3],
      this.stdWeightPosition * mean[3],
      1e-1,
      this.stdWeightPosition * mean[3]
    ];
    for (let i = 0; i < MEASUREMENT_DIM; i++) {
      S[i][i] += std[i] * std[i];
    }

    // K = P * H^T * S^-1
    const gain = matMul(matMul(covariance, transpose(this.updateMat)), inverse(S));

    // x = x + K * y
    const correction = matVec(gain, innovation);
    const updatedMean = mean.map((m, i) => m + correction[i]);

    // P = (I - K * H) * P
    const updatedCovariance = matMul(subtract(eye(STATE_DIM), matMul(gain, this.updateMat)), covariance);

    return [updatedMean, updatedCovariance];
  }

  /**
   * Convert state to a tlbr box.
   */
  stateToBbox(state: Vector): Tlbr {
    const [cx, cy, a, h] = state;
    const w = a * h;
    return [cx - w / 2, cy - h / 2, cx + w / 2, cy + h / 2];
  }
}

function toMeasurement([x1, y1, x2, y2]: Tlbr): Vector {
  const w = x2 - x1;
  const h = y2 - y1;
  return [(x1 + x2) / 2, (y1 + y2) / 2, w / h, h];
}

// Matrix operations
function diag(values: Vector): Matrix {
  const result = zeros(values.length, values.length);
  values.forEach((v, i) => {
    result[i][i] = v;
  });
  return result;
}

function eye(n: number): Matrix {
  return diag(new Array<number>(n).fill(1));
}

function zeros(rows: number, cols: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

function matVec(A: Matrix, b: Vector): Vector {
  return A.map(row => row.reduce((sum, val, i) => sum + val * b[i], 0));
}

function matMul(A: Matrix, B: Matrix): Matrix {
  const result = zeros(A.length, B[0].length);
  for (let i = 0; i < A.length; i++) {
    for (let j = 0; j < B[0].length; j++) {
      for (let k = 0; k < A[0].length; k++) {
        result[i][j] += A[i][k] * B[k][j];
      }
    }
  }
  return result;
}

function transpose(A: Matrix): Matrix {
  return A[0].map((_, i) => A.map(row => row[i]));
}

function subtract(A: Matrix, B: Matrix): Matrix {
  return A.map((row, i) => row.map((val, j) => val - B[i][j]));
}

function inverse(A: Matrix): Matrix {
  // Gauss-Jordan elimination with partial pivoting
  const n = A.length;
  const augmented: Matrix = A.map((row, i) => [...row, ...Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))]);

  for (let i = 0; i < n; i++) {
    let maxRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(augmented[k][i]) > Math.abs(augmented[maxRow][i])) {
        maxRow = k;
      }
    }
    [augmented[i], augmented[maxRow]] = [augmented[maxRow], augmented[i]];

    const pivot = augmented[i][i];
    for (let j = 0; j < 2 * n; j++) {
      augmented[i][j] /= pivot;
    }

    for (let k = 0; k < n; k++) {
      if (k !== i) {
        const factor = augmented[k][i];
        for (let j = 0; j < 2 * n; j++) {
          augmented[k][j] -= factor * augmented[i][j];
        }
      }
    }
  }

  return augmented.map(row => row.slice(n));
}
