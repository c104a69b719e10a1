import { createLogger } from '@tickcast/utils';
import type { Clock, RandomSource } from '../core/random.js';
import { resolveSourceKind } from '../generator/fields.js';
import { SignalGenerator } from '../generator/signal-generator.js';

const logger = createLogger({ name: 'signals:registry', service: 'signals' });

/** Default cap on generators created for names outside the built-in kinds */
export const DEFAULT_MAX_GENERIC_SOURCES = 50;

export interface SourceRegistryOptions {
  random?: RandomSource;
  clock?: Clock;
  /** Maximum number of `generic` generators; built-in kinds are never refused */
  maxGenericSources?: number;
}

/**
 * Thrown when a new generic source would exceed the registry's cap
 */
export class SourceLimitError extends Error {
  constructor(
    public readonly source: string,
    public readonly limit: number
  ) {
    super(`Source limit reached: cannot create "${source}" (at most ${limit} custom sources)`);
    this.name = 'SourceLimitError';
  }
}

/**
 * SourceRegistry owns one SignalGenerator per source name.
 *
 * Generators are created on first request and live for the lifetime of
 * the registry. Lookup and insert happen in one synchronous call, so the
 * first caller creates the generator and every later caller reuses it.
 * Names outside the built-in kinds are capped at `maxGenericSources`.
 */
export class SourceRegistry {
  private readonly generators: Map<string, SignalGenerator> = new Map();
  private readonly random?: RandomSource;
  private readonly clock?: Clock;
  private readonly maxGenericSources: number;
  private genericCount = 0;

  constructor(opts: SourceRegistryOptions = {}) {
    this.random = opts.random;
    this.clock = opts.clock;
    this.maxGenericSources = opts.maxGenericSources ?? DEFAULT_MAX_GENERIC_SOURCES;
  }

  /** Whether `getOrCreate(source)` would succeed */
  canServe(source: string): boolean {
    return (
      this.generators.has(source) ||
      resolveSourceKind(source) !== 'generic' ||
      this.genericCount < this.maxGenericSources
    );
  }

  /**
   * Return the generator for a source, creating it on first use.
   *
   * @throws SourceLimitError when a new generic source would exceed the cap
   */
  getOrCreate(source: string): SignalGenerator {
    const existing = this.generators.get(source);
    if (existing) {
      return existing;
    }

    if (!this.canServe(source)) {
      throw new SourceLimitError(source, this.maxGenericSources);
    }

    const generator = new SignalGenerator({ source, random: this.random, clock: this.clock });
    this.generators.set(source, generator);
    if (generator.kind === 'generic') {
      this.genericCount++;
    }
    logger.info({ source, kind: generator.kind, fields: generator.fieldNames }, 'Signal generator created');
    return generator;
  }

  get(source: string): SignalGenerator | undefined {
    return this.generators.get(source);
  }

  has(source: string): boolean {
    return this.generators.has(source);
  }

  /** Source names with a live generator, in creation order */
  activeSources(): string[] {
    return [...this.generators.keys()];
  }

  get size(): number {
    return this.generators.size;
  }
}
