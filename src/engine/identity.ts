/**
 * Verifies that a caller holds the privileged witness capability
 * (registry writes, configuration, cancellation, node reports).
 */
export interface WitnessVerifier {
  authorize(caller: string): boolean;
}

export class AllowListVerifier implements WitnessVerifier {
  private allowed: Set<string>;

  constructor(identities: Iterable<string>) {
    this.allowed = new Set(identities);
  }

  authorize(caller: string): boolean {
    return this.allowed.has(caller);
  }
}
