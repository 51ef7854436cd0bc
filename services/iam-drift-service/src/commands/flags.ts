/**
 * Command-line flag parsing
 *
 * Accepts `--name value`, `--name=value` and bare boolean flags.
 */

import { ConfigurationError } from '@driftwatch/shared-utils';

export type FlagValues = Map<string, string | true>;

export interface FlagDefinitions {
  strings: readonly string[];
  booleans?: readonly string[];
}

export function parseFlags(args: readonly string[], definitions: FlagDefinitions): FlagValues {
  const strings = new Set(definitions.strings);
  const booleans = new Set(definitions.booleans ?? []);
  const values: FlagValues = new Map();
  const unexpected: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      unexpected.push(arg);
      continue;
    }

    const separator = arg.indexOf('=');
    const name = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    const inline = separator === -1 ? undefined : arg.slice(separator + 1);

    if (booleans.has(name)) {
      values.set(name, inline ?? true);
    } else if (strings.has(name)) {
      if (inline !== undefined) {
        values.set(name, inline);
        continue;
      }
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`missing value for --${name}`, 'iam-drift', { flag: name });
      }
      values.set(name, next);
      i++;
    } else {
      throw new ConfigurationError(`unknown flag --${name}`, 'iam-drift', { flag: name });
    }
  }

  if (unexpected.length > 0) {
    throw new ConfigurationError(`unexpected arguments: ${unexpected.join(' ')}`, 'iam-drift', { unexpected });
  }
  return values;
}

export function stringFlag(values: FlagValues, name: string): string | undefined {
  const value = values.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function booleanFlag(values: FlagValues, name: string): boolean {
  const value = values.get(name);
  if (value === undefined) {
    return false;
  }
  return value === true || value.toLowerCase() === 'true' || value === '1';
}
