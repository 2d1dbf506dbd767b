/**
 * Request body schemas for the session routes.
 */

import { z } from "zod";
import type { JsonValue } from "./types";

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([scalarSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const sessionEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("load"), input: jsonValueSchema }),
  z.object({
    type: z.literal("upload"),
    fileName: z.string().min(1),
    content: z.string(),
  }),
  z.object({
    type: z.literal("record"),
    itemId: z.string().min(1),
    value: z.union([z.number(), z.string()]),
  }),
  z.object({ type: z.literal("next") }),
  z.object({ type: z.literal("prev") }),
  z.object({ type: z.literal("resume") }),
  z.object({ type: z.literal("setHideCompleted"), hideCompleted: z.boolean() }),
]);

export const eventRequestSchema = z.object({
  session_id: z.string().min(1),
  event: sessionEventSchema,
});

export const startRequestSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("score"),
    input: jsonValueSchema.optional(),
    hide_completed: z.boolean().optional(),
    seed: z.string().min(1).optional(),
  }),
  z.object({
    mode: z.literal("choice"),
    hide_completed: z.boolean().optional(),
  }),
]);

export const annotationRequestSchema = z.object({
  text_id: z.string().min(1),
  ratings: z.array(z.unknown()),
  feedback: z.string().default(""),
});
