import { z } from 'zod';

const NonEmptyString = z.string().trim().min(1, 'Debe proporcionar un valor.');
const PositiveInt = z.number().int().positive();
const NonNegativeInt = z.number().int().nonnegative();

export const FetchArgsSchema = z.object({
  input: NonEmptyString,
  output: NonEmptyString,
  dumpDir: NonEmptyString,
  dump: z.boolean().default(true),
  column: NonEmptyString,
  template: NonEmptyString,
  storageStatePath: NonEmptyString,
  protoDir: NonEmptyString,
  limit: NonNegativeInt.optional(),
  offset: NonNegativeInt.default(0),
  refetch: z.boolean().default(false),
  poolSize: PositiveInt,
  concurrency: PositiveInt,
  paceMs: NonNegativeInt,
  maxFrames: PositiveInt,
  frameTimeoutMs: PositiveInt.optional(),
  totalTimeoutMs: PositiveInt,
});

export type FetchArgsInput = z.input<typeof FetchArgsSchema>;
export type FetchArgs = z.output<typeof FetchArgsSchema>;
