/**
 * Types for the Record Normalizer
 */

import type { ISODate } from '@invoice-bridge/contracts';
import type { Clock } from '@invoice-bridge/shared';

/**
 * One parsed XML element: attributes under `@_Name`, children by local name,
 * text under `#text`.
 */
export type XmlNode = Record<string, unknown>;

/**
 * A well-formed source document with the expected root element
 */
export interface SourceDocument {
  /** Local name of the root element */
  rootName: string;

  root: XmlNode;
}

/**
 * Options for normalization
 */
export interface NormalizeOptions {
  /**
   * Date substituted for missing or unparsable source dates.
   * Defaults to today's local date from `clock`.
   */
  processingDate?: ISODate;

  /**
   * Clock used when no processing date is given
   */
  clock?: Clock;
}
