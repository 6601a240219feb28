/**
 * @fileoverview Key-value engine contract
 */

/**
 * Opaque string-keyed store. Values are replaced whole on every `set`.
 */
export interface KeyValueStore {
  /** Value under `key`, or null if nothing was ever written */
  get(key: string): Promise<string | null>;

  /** Write `value` under `key`, overwriting any prior value */
  set(key: string, value: string): Promise<void>;

  /** Release underlying resources */
  close(): Promise<void>;
}
