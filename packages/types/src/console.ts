/**
 * Console handle types.
 */

import { Schema } from "effect";

/** Console handles a program can read from or write to. */
export const HANDLES = ["stdin", "stdout", "stderr"] as const;

export const HandleSchema = Schema.Literal(...HANDLES);
export type Handle = typeof HandleSchema.Type;
