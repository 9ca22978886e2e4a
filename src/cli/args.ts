export interface ParsedArgs {
  file?: string;
  autoplaySeconds?: number;
  /** Raw --autoplay value when it is not a number */
  invalidAutoplay?: string;
  eventLogPath?: string;
  check: boolean;
  version: boolean;
  help: boolean;
}

export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const args = [...argv];
  const result: ParsedArgs = {
    check: false,
    version: false,
    help: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
      continue;
    }

    if (arg === "--version" || arg === "-v") {
      result.version = true;
      i++;
      continue;
    }

    if (arg === "--check" || arg === "-c") {
      result.check = true;
      i++;
      continue;
    }

    if ((arg === "--autoplay" || arg === "-s") && i + 1 < args.length) {
      const value = args[i + 1];
      const seconds = Number(value);
      if (value.trim() !== "" && Number.isFinite(seconds) && seconds > 0) {
        result.autoplaySeconds = seconds;
      } else {
        result.invalidAutoplay = value;
      }
      i += 2;
      continue;
    }

    if ((arg === "--log" || arg === "-l") && i + 1 < args.length) {
      result.eventLogPath = args[i + 1];
      i += 2;
      continue;
    }

    // Positional argument - presentation file
    if (!arg.startsWith("-") && !result.file) {
      result.file = arg;
      i++;
      continue;
    }

    i++;
  }

  return result;
}

export function getHelpText(): string {
  return `
termdeck - terminal presentations from plain text

Usage:
  termdeck <file> [options]

Options:
  --autoplay, -s <seconds>  Advance to the next page every <seconds>
  --log, -l <file>          Append playback events to <file> as JSON lines
  --check, -c               Compile only and print a summary
  --version, -v             Print the version
  --help, -h                Show this help message

Keys:
  space, enter, l, j, d, →, ↓  next page
  h, k, a, b, ←, ↑             previous page
  s                            first page
  g                            jump to page
  z                            redraw
  ?                            help
  q                            quit

Environment Variables:
  TERMDECK_AUTOPLAY_SECONDS  Default autoplay interval
  TERMDECK_EVENT_LOG         Default event log file
  TERMDECK_INDENT            Page margin in columns (default: 3)
  TERMDECK_SHOW_STATUS       Show the status line (default: true)
  DEBUG                      Set to "true" for stack traces

Examples:
  termdeck talk.tpp
  termdeck talk.tpp --autoplay 5
  termdeck talk.tpp --check
`;
}

export function getValidationError(parsed: ParsedArgs): string | null {
  if (parsed.help || parsed.version) {
    return null;
  }

  if (!parsed.file) {
    return "Error: a presentation file is required";
  }

  if (parsed.invalidAutoplay !== undefined) {
    return `Error: --autoplay expects a positive number of seconds, got "${parsed.invalidAutoplay}"`;
  }

  return null;
}
