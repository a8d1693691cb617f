function parseInstant(isoTimestamp: string) {
  const instant = new Date(isoTimestamp);

  if (Number.isNaN(instant.getTime())) {
    throw new Error(`Invalid ISO timestamp: ${isoTimestamp}`);
  }

  return instant;
}

export function fixedClock(isoTimestamp: string): () => Date {
  const fixedInstant = parseInstant(isoTimestamp);
  return () => new Date(fixedInstant.getTime());
}

export interface ManualClock {
  now: () => Date;
  advanceSeconds(seconds: number): void;
  set(isoTimestamp: string): void;
}

export function manualClock(isoTimestamp: string): ManualClock {
  let currentMs = parseInstant(isoTimestamp).getTime();

  return {
    now: () => new Date(currentMs),
    advanceSeconds(seconds) {
      currentMs += seconds * 1000;
    },
    set(next) {
      currentMs = parseInstant(next).getTime();
    }
  };
}
