import { z } from "zod";
import type { AnswerKey } from "@/lib/challenge/types";

export const dateKeySchema = z.string().regex(/^\d{8}$/);

export const answerDataSchema = z.union([
  z.object({ text: z.string().max(200) }).strict(),
  z.object({ selectedOption: z.string().max(200) }).strict(),
  z.object({ answer: z.boolean() }).strict(),
]);

export const rotationTierSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("default") }),
  z.object({ kind: z.literal("named"), label: z.string().min(1) }),
  z.object({ kind: z.literal("user"), uid: z.string().min(1) }),
]);

const knownAnswerKeySchema = z.discriminatedUnion("format", [
  z.object({
    format: z.literal("text_input"),
    answer: z.string(),
    acceptedAnswers: z.array(z.string()),
  }),
  z.object({
    format: z.literal("multiple_choice"),
    correct: z.string(),
    options: z.array(z.string()),
  }),
  z.object({
    format: z.literal("true_false"),
    answer: z.boolean(),
    statement: z.string(),
  }),
]);

const declaredFormatSchema = z.object({ format: z.string() });

/** Reads a stored answer key; formats this build cannot judge become `unsupported`. */
export function parseAnswerKey(raw: unknown): AnswerKey {
  const known = knownAnswerKeySchema.safeParse(raw);
  if (known.success) {
    return known.data;
  }
  const declared = declaredFormatSchema.safeParse(raw);
  return {
    format: "unsupported",
    declaredFormat: declared.success ? declared.data.format : "missing",
  };
}
