import { configError } from './cgiErrors.js';

const WHITESPACE = /\s/;
const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/;

/**
 * Splits a command line into a program and its arguments using POSIX
 * shell quoting rules, without involving a shell. Single quotes are
 * literal; inside double quotes a backslash escapes only `"` and `\`;
 * outside quotes a backslash escapes any character.
 */
export function splitCommandLine(commandLine: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | undefined;

  for (let index = 0; index < commandLine.length; index += 1) {
    const char = commandLine[index];

    if (quote === "'") {
      if (char === "'") {
        quote = undefined;
      } else {
        current += char;
      }
      continue;
    }

    if (quote === '"') {
      const next = commandLine[index + 1];
      if (char === '"') {
        quote = undefined;
      } else if (char === '\\' && (next === '"' || next === '\\')) {
        current += next;
        index += 1;
      } else {
        current += char;
      }
      continue;
    }

    if (WHITESPACE.test(char)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    inToken = true;
    if (char === "'" || char === '"') {
      quote = char;
      continue;
    }
    if (char === '\\') {
      if (index + 1 >= commandLine.length) {
        throw configError(`No escaped character at end of command line: ${commandLine}`);
      }
      current += commandLine[index + 1];
      index += 1;
      continue;
    }
    current += char;
  }

  if (quote) {
    throw configError(`No closing quotation in command line: ${commandLine}`);
  }
  if (inToken) {
    args.push(current);
  }
  return args;
}

export function quoteArgument(argument: string): string {
  if (argument.length === 0) {
    return "''";
  }
  if (SAFE_ARGUMENT.test(argument)) {
    return argument;
  }
  return `'${argument.replace(/'/g, `'"'"'`)}'`;
}

export function joinCommandLine(args: readonly string[]): string {
  return args.map(quoteArgument).join(' ');
}
