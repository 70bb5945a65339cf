/**
 * Reference ability provider contracts.
 */

export interface AbilityRequest {
  payload: Record<string, unknown>;
  /** Snapshot of the caller's request state. */
  state: Record<string, unknown>;
}

export type AbilityResponse = Record<string, unknown>;

export type AbilityHandler = (req: AbilityRequest) => Promise<AbilityResponse>;

export type AbilityTable = Readonly<Record<string, AbilityHandler>>;
