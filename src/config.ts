import { z } from "zod";

export interface Config {
  /** Seconds between pages in autoplay mode; null for interactive playback */
  autoplaySeconds: number | null;
  /** JSONL file receiving playback events; null disables the event log */
  eventLogPath: string | null;
  /** Left/right page margin in columns */
  indent: number;
  /** Whether the status line (slide number, header, footer) is shown */
  showStatus: boolean;
}

export interface CLIOptions {
  autoplaySeconds?: number;
  eventLogPath?: string;
}

const DEFAULT_CONFIG = {
  indent: 3,
  showStatus: true,
};

// Empty variables count as unset
const TRUE_WORDS = ["1", "true", "yes", "on"] as const;
const FALSE_WORDS = ["0", "false", "no", "off"] as const;

const BooleanEnvSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum([...TRUE_WORDS, ...FALSE_WORDS]));

const optionalEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema.optional());

export const EnvSchema = z.object({
  TERMDECK_AUTOPLAY_SECONDS: optionalEnv(z.coerce.number().positive()),
  TERMDECK_EVENT_LOG: optionalEnv(z.string()),
  TERMDECK_INDENT: optionalEnv(z.coerce.number().int().min(0).max(20)),
  TERMDECK_SHOW_STATUS: optionalEnv(BooleanEnvSchema),
});

export const CLIOptionsSchema = z.object({
  autoplaySeconds: z.number().positive().optional(),
  eventLogPath: z.string().min(1).optional(),
});

const TRUE_SET: ReadonlySet<string> = new Set(TRUE_WORDS);

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return TRUE_SET.has(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`)
    .join("; ");
}

export function loadConfig(cliOptions: CLIOptions = {}, env: NodeJS.ProcessEnv = process.env): Config {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new Error(`Invalid environment: ${describeIssues(parsedEnv.error)}`);
  }

  const parsedCli = CLIOptionsSchema.safeParse(cliOptions);
  if (!parsedCli.success) {
    throw new Error(`Invalid options: ${describeIssues(parsedCli.error)}`);
  }

  const vars = parsedEnv.data;
  const options = parsedCli.data;

  return {
    autoplaySeconds: options.autoplaySeconds ?? vars.TERMDECK_AUTOPLAY_SECONDS ?? null,
    eventLogPath: options.eventLogPath ?? vars.TERMDECK_EVENT_LOG ?? null,
    indent: vars.TERMDECK_INDENT ?? DEFAULT_CONFIG.indent,
    showStatus: parseBoolean(vars.TERMDECK_SHOW_STATUS, DEFAULT_CONFIG.showStatus),
  };
}
