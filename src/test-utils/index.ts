import { Clock, Detection, Logger, Tlbr } from '../types';

export type MockLogger = { [K in keyof Logger]: jest.Mock };

export function createLogger(): MockLogger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

export class FakeClock implements Clock {
  private elapsed: number = 0;

  constructor(private readonly wallStart: Date = new Date('2025-06-21T18:00:00.000Z')) {}

  now(): number {
    return this.elapsed;
  }

  wallClock(): Date {
    return new Date(this.wallStart.getTime() + this.elapsed);
  }

  advance(ms: number): void {
    this.elapsed += ms;
  }
}

/**
 * Records requested delays and resolves immediately.
 */
export function createFakeSleep(onSleep?: (ms: number) => void): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
      onSleep?.(ms);
    }
  };
}

export function boxAt(cx: number, cy: number, width: number = 60, height: number = 60): Tlbr {
  return [cx - width / 2, cy - height / 2, cx + width / 2, cy + height / 2];
}

export function detectionAt(cx: number, cy: number, score: number = 0.9, className: string = 'boat'): Detection {
  return { bbox: boxAt(cx, cy), score, class: className };
}
