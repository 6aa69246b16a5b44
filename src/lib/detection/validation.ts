import { z } from 'zod';
import { Detection, Logger } from '../../types';
import { DetectionValidationError } from '../errors';

const coordinate = z.number().finite();

export const DetectionSchema = z
  .object({
    bbox: z.tuple([coordinate, coordinate, coordinate, coordinate]),
    score: z.number().min(0).max(1),
    class: z.string().optional()
  })
  .refine(({ bbox: [x1, , x2] }) => x1 < x2, { message: 'x1 must be less than x2', path: ['bbox'] })
  .refine(({ bbox: [, y1, , y2] }) => y1 < y2, { message: 'y1 must be less than y2', path: ['bbox'] });

export interface ValidationResult {
  valid: Detection[];
  rejected: DetectionValidationError[];
}

/**
 * Split a frame's detections into well-formed ones and rejections.
 */
export function validateDetections(detections: readonly unknown[]): ValidationResult {
  const valid: Detection[] = [];
  const rejected: DetectionValidationError[] = [];

  detections.forEach((raw, index) => {
    const parsed = DetectionSchema.safeParse(raw);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      const reason = parsed.error.issues.map(issue => `${issue.path.join('.') || 'detection'}: ${issue.message}`).join(', ');
      rejected.push(new DetectionValidationError(index, reason));
    }
  });

  return { valid, rejected };
}

export function reportRejections(rejected: DetectionValidationError[], logger: Logger, context: string): void {
  for (const error of rejected) {
    logger.warn(`[${error.component}] ${context}: ${error.message}`);
  }
}
