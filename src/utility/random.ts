/**
 * Unique token generation
 *
 * Multipart boundaries and message ids need tokens that are unlikely to
 * repeat. Tokens mix the clock, the process id and a Park-Miller minimal
 * standard generator.
 */

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 16807;

/**
 * Sources of entropy for token generation
 */
export interface TokenSource {
  /** Milliseconds since the epoch */
  clock: () => number;
  /** Current process id */
  processId: number;
  /** Initial generator state (defaults to the clock) */
  seed?: number;
}

export class TokenGenerator {
  private state: number;
  private readonly clock: () => number;
  private readonly processId: number;

  constructor(source: TokenSource) {
    this.clock = source.clock;
    this.processId = source.processId;
    this.state = normalizeSeed(source.seed ?? source.clock());
  }

  /**
   * Next pseudo-random value in [1, 2^31 - 2]
   */
  next(): number {
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return this.state;
  }

  /** Seconds since the epoch */
  time(): number {
    return Math.floor(this.clock() / 1000);
  }

  process(): number {
    return this.processId;
  }

  /**
   * Generates a multipart boundary: "=_" followed by base-36 groups
   */
  boundary(): string {
    return `=_${this.next().toString(36)}${this.time().toString(36)}_${this.next().toString(36)}`;
  }

  /**
   * Generates the left-hand side of a message id
   */
  messageIdLeft(): string {
    return `${this.time().toString(36)}.${this.process().toString(36)}.${this.next().toString(36)}`;
  }
}

function normalizeSeed(seed: number): number {
  const value = Math.abs(Math.floor(seed)) % MODULUS;
  return value === 0 ? 1 : value;
}
