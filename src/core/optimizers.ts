import { platform } from 'node:os';
import { ConfigurationError } from '../types/errors.js';

/** A pure prompt rewrite applied before the request is built */
export type Optimizer = (prompt: string) => string;

export function codeOptimizer(prompt: string): string {
  return (
    'Your Role: Provide only code as output without any description.\n' +
    'IMPORTANT: Provide only plain text without Markdown formatting.\n' +
    'IMPORTANT: Do not include markdown formatting.\n' +
    'If there is a lack of details, provide most logical solution. ' +
    'You are not allowed to ask for more details.\n' +
    'Ignore any potential risk of errors or confusion.\n\n' +
    `Request: ${prompt}\n` +
    'Code:'
  );
}

export function shellCommandOptimizer(
  prompt: string,
  osName: string = platform(),
  shell: string = defaultShell(osName)
): string {
  return (
    'Your role: Provide only plain text without Markdown formatting. ' +
    'Do not show any warnings or information regarding your capabilities. ' +
    'Do not provide any description. If you need to store any data, ' +
    `assume it will be stored in the chat. Provide only ${shell} ` +
    `command for ${osName} without any description. If there is a lack of ` +
    'details, provide most logical solution. Ensure the output is a ' +
    'valid shell command. If multiple steps required try to combine ' +
    `them together. Prompt: ${prompt}\n\nCommand:`
  );
}

function defaultShell(osName: string): string {
  const fromEnv = process.env['SHELL'];
  if (fromEnv) return fromEnv.split('/').pop() ?? fromEnv;
  return osName === 'win32' ? 'powershell' : 'bash';
}

export const BUILTIN_OPTIMIZERS: ReadonlyMap<string, Optimizer> = new Map<string, Optimizer>([
  ['code', codeOptimizer],
  ['shell_command', (prompt) => shellCommandOptimizer(prompt)],
]);

/**
 * Named prompt transforms, looked up at call time. Iterating never consumes
 * the registry, so validation works on every call.
 */
export class OptimizerRegistry {
  private readonly optimizers: Map<string, Optimizer>;

  constructor(entries: Iterable<readonly [string, Optimizer]> = BUILTIN_OPTIMIZERS) {
    this.optimizers = new Map(entries);
  }

  register(name: string, optimizer: Optimizer): this {
    this.optimizers.set(name, optimizer);
    return this;
  }

  has(name: string): boolean {
    return this.optimizers.has(name);
  }

  names(): string[] {
    return [...this.optimizers.keys()];
  }

  apply(name: string, prompt: string): string {
    const optimizer = this.optimizers.get(name);
    if (!optimizer) {
      throw new ConfigurationError(
        `Optimizer "${name}" is not one of: ${this.names().join(', ')}`
      );
    }
    return optimizer(prompt);
  }
}
