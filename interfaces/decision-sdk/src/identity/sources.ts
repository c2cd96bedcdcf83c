import { v4 as uuidv4 } from "uuid";

/**
 * Where records get their ids and timestamps. Accumulators, builders and
 * normalizers take one at construction so replays and tests can pin both.
 */
export type IdentitySource = {
  nextId: () => string;
  now: () => Date;
};

export const randomIdentity: IdentitySource = {
  nextId: () => uuidv4(),
  now: () => new Date()
};

export type SequentialIdentityOptions = {
  start?: Date | string;
  stepMs?: number;
  prefix?: string;
};

/** Ids run `${prefix}-0001`, `${prefix}-0002`, …; each clock reading advances by `stepMs`. */
export function sequentialIdentity(options: SequentialIdentityOptions = {}): IdentitySource {
  const stepMs = options.stepMs ?? 1;
  const prefix = options.prefix ?? "seq";
  let counter = 0;
  let time = options.start === undefined ? Date.now() : new Date(options.start).getTime();

  return {
    nextId: () => {
      counter += 1;
      return `${prefix}-${String(counter).padStart(4, "0")}`;
    },
    now: () => {
      const reading = new Date(time);
      time += stepMs;
      return reading;
    }
  };
}

export function generateId(source: IdentitySource = randomIdentity): string {
  return source.nextId();
}

export function nowIso(source: IdentitySource = randomIdentity): string {
  return source.now().toISOString();
}
