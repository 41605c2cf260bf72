export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface ParsedArgs {
  positionals: string[];
  /** Every value given for an option, in order; flags hold "true" */
  options: Record<string, string[]>;
}

export interface ParseArgsConfig {
  /** Options that never take a value */
  flags?: readonly string[];
}

/**
 * Split `--key value`, `--key=value` and bare flags from positional arguments.
 * An option may be given more than once; `--` ends option parsing.
 */
export const parseArgs = (args: readonly string[], config: ParseArgsConfig = {}): ParsedArgs => {
  const flags = new Set(config.flags ?? []);
  const positionals: string[] = [];
  const options: Record<string, string[]> = {};
  const push = (key: string, value: string) => {
    options[key] = [...(options[key] ?? []), value];
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      push(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }
    const value = args[i + 1];
    if (!flags.has(body) && value !== undefined && !value.startsWith('--')) {
      push(body, value);
      i++;
    } else {
      push(body, 'true');
    }
  }

  return { positionals, options };
};

export const optionValue = (parsed: ParsedArgs, name: string): string | undefined => {
  const values = parsed.options[name];
  return values ? values[values.length - 1] : undefined;
};

export const optionValues = (parsed: ParsedArgs, name: string): string[] => parsed.options[name] ?? [];

export const hasFlag = (parsed: ParsedArgs, name: string): boolean => optionValue(parsed, name) === 'true';

export const integerOption = (parsed: ParsedArgs, name: string, min = 0): number | undefined => {
  const raw = optionValue(parsed, name);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw) || Number(raw) < min) {
    throw new CliUsageError(`--${name} must be an integer of at least ${min}, got "${raw}"`);
  }
  return Number(raw);
};
