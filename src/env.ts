/**
 * Environment variable access.
 *
 * Use Env.get() instead of process.env throughout the codebase so tests and
 * embedders have a single seam for environment lookups.
 */

export type EnvMap = Readonly<Record<string, string | undefined>>;

export class Env {
  private static source: () => EnvMap = () => process.env;

  /**
   * Get env var value (fresh value each call).
   * Returns undefined if var is unset.
   */
  static get(name: string): string | undefined {
    return this.source()[name];
  }

  /**
   * Check if env var exists.
   */
  static has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Get all set env vars as object (fresh values).
   */
  static toObject(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.source())) {
      if (value !== undefined) {
        result[name] = value;
      }
    }
    return result;
  }

  /**
   * Replace the backing environment (for testing). Pass nothing to restore process.env.
   */
  static use(env?: EnvMap): void {
    this.source = env ? () => env : () => process.env;
  }
}
