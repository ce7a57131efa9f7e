export class DotweaveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends DotweaveError {}

export class RegistryError extends DotweaveError {}

export class CommandError extends DotweaveError {
  constructor(
    readonly command: string,
    readonly code: number,
    readonly stderr: string,
  ) {
    super(`${command} exited with code ${code}${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
  }
}

/**
 * One-line cause string for any thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    const firstLine = err.message.split('\n')[0];
    return code && !firstLine.startsWith(code) ? `${code}: ${firstLine}` : firstLine;
  }
  return String(err);
}
