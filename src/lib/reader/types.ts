/**
 * Reader module types
 */

export interface ListNdjsonOptions {
  /** Only keep files whose first record has one of these resource types */
  resourceTypes?: Iterable<string>;
  recursive?: boolean;
}

/**
 * File path → resourceType of its first record (null when absent)
 */
export type NdjsonFileIndex = Map<string, string | null>;
