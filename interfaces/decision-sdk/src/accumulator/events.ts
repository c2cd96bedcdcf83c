import { z } from "zod";
import type { ToolKind } from "../classifier/classifier";
import type { JsonObject } from "../model/types";

export const normalizedEventSchema = z.object({
  kind: z.enum(["read", "write"]).optional(),
  id: z.string().min(1),
  toolName: z.string().min(1),
  args: z.record(z.unknown()).default({}),
  output: z.unknown().optional(),
  error: z.string().nullable().default(null),
  timestamp: z.string().datetime({ offset: true }).optional()
});

/** The single event shape the accumulator accepts from framework adapters. */
export type NormalizedEvent = {
  kind?: ToolKind;
  id: string;
  toolName: string;
  args: JsonObject;
  output?: unknown;
  error: string | null;
  timestamp?: string;
};

export function parseNormalizedEvent(payload: unknown): NormalizedEvent {
  return normalizedEventSchema.parse(payload);
}
