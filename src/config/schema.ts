import { z } from 'zod';
import { STRATEGY_NAMES } from '../matching/strategy.js';
import { DEFAULT_NUMERIC_LABELS } from '../matching/numeric-field.js';
import { DEFAULT_CONTEXT_RADIUS } from '../matching/context-block.js';
import { DEFAULT_FAILURE_MARKER, DEFAULT_FAILURE_WORD } from '../parsing/failure-parser.js';

const ParserConfigSchema = z
  .object({
    /** Text introducing each mismatch section in the harness output. */
    marker: z.string().min(1).default(DEFAULT_FAILURE_MARKER),
    /** Word whose presence in the output means at least one test failed. */
    failureWord: z.string().min(1).default(DEFAULT_FAILURE_WORD),
  })
  .default({});

const MatchingConfigSchema = z
  .object({
    /** Strategies to enable. They always run in their fixed priority order. */
    strategies: z.array(z.enum(STRATEGY_NAMES)).min(1).default([...STRATEGY_NAMES]),
    /** Labels recognised by the numeric-field strategy (`<label>=<number>`). */
    numericLabels: z.array(z.string().min(1)).default(DEFAULT_NUMERIC_LABELS),
    /** Lines on each side of the anchor line replaced by the context-block strategy. */
    contextRadius: z.number().int().min(0).default(DEFAULT_CONTEXT_RADIUS),
  })
  .default({});

export const ReconcileConfigSchema = z.object({
  /** Fixture source file holding the expected-value literals. */
  fixture: z.string().min(1),

  /**
   * Shell command that runs the harness. `{filter}` is replaced by the
   * shell-quoted test filter.
   */
  command: z.string().min(1).default('go test -run {filter} ./...'),

  /** Test filter handed to the harness. Empty runs everything the command selects. */
  filter: z.string().default(''),

  /** Working directory for the harness command. */
  cwd: z.string().default('.'),

  /** Harness timeout in milliseconds. */
  timeout: z.number().int().positive().optional(),

  /** Harness runs before giving up on convergence. */
  maxIterations: z.number().int().min(1).default(5),

  parser: ParserConfigSchema,
  matching: MatchingConfigSchema,

  /** Where logs and run reports are written. */
  stateDir: z.string().default('.reconcile'),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  /** Write a JSON run report under `<stateDir>/reports`. */
  report: z.boolean().default(true),
});

export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
