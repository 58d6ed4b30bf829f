/**
 * Relay loop configuration schema and loader.
 *
 * Every field has a default, so an absent config file is valid.
 * Power users can create relayloop.yml in the working directory to customize.
 */

import { z } from 'zod';

// =============================================================================
// Duration Parsing
// =============================================================================

const DURATION_RE = /^(\d+)(ms|s|m|h)?$/;

/** Largest delay setTimeout honors; longer ones fire at once. */
export const MAX_DURATION_MS = 2_147_483_647;

/**
 * Parse a human-readable duration string into milliseconds.
 * A bare number is read as seconds.
 */
export function parseDuration(input: string): number {
  const match = DURATION_RE.exec(input.trim());
  if (!match) {
    throw new Error(`Invalid duration: "${input}" (expected format: 600, 15m, 30s, 1h, 500ms)`);
  }
  const value = parseInt(match[1]!, 10);
  const ms = value * unitMs(match[2] ?? 's');
  if (ms > MAX_DURATION_MS) {
    throw new Error(`Duration too long: "${input}" (maximum: ${MAX_DURATION_MS}ms)`);
  }
  return ms;
}

function unitMs(unit: string): number {
  switch (unit) {
    case 'ms':
      return 1;
    case 's':
      return 1000;
    case 'm':
      return 60 * 1000;
    case 'h':
      return 60 * 60 * 1000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

// =============================================================================
// Config Schema
// =============================================================================

export const DEFAULT_TRUST_TOOLS = 'read,write,glob,grep';

export const BackendName = z.enum(['chat', 'subprocess']);
export type BackendNameType = z.infer<typeof BackendName>;

const Duration = z.union([z.string(), z.number().int().positive()]).transform((value, ctx) => {
  try {
    const ms = parseDuration(String(value));
    if (ms <= 0) throw new Error(`Duration must be positive: "${value}"`);
    return ms;
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

export const RelayConfigSchema = z.object({
  agent: z
    .object({
      backend: BackendName.default('chat'),
      path: z.string().nullable().default(null),
      command: z.string().nullable().default(null),
      profile: z.string().nullable().default(null),
      trust_tools: z.string().default(DEFAULT_TRUST_TOOLS),
      trust_all_tools: z.boolean().default(false),
      timeout: Duration.default('600'),
      max_retries: z.number().int().min(1).default(3),
      intervene_on_final_retry: z.boolean().default(false),
    })
    .default({}),

  max_agent_invocations: z.number().int().min(1).default(10),

  execution: z
    .object({
      unmarked_review: z.enum(['rework', 'wait']).default('rework'),
    })
    .default({}),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type RelayConfigInput = z.input<typeof RelayConfigSchema>;

/** Load and validate a raw config object, applying all defaults. */
export function parseRelayConfig(raw: unknown): RelayConfig {
  return RelayConfigSchema.parse(raw ?? {});
}
