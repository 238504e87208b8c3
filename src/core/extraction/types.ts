import { BrowserSession, SessionFactory } from '../session/types.js';

/**
 * Outcome of one routine: nothing (or an empty string) on success, otherwise a
 * human-readable failure message.
 */
export type RoutineResult = string | null | undefined | void;

export interface ExtractionRoutine {
  name: string;
  /** First line is used in log output instead of the name. */
  description?: string;
  /** Keys of `data` this routine fills; cleared when it fails. */
  fields?: readonly string[];
  run: () => Promise<RoutineResult>;
}

export interface PageExtractorOptions {
  session?: BrowserSession;
  sessionFactory?: SessionFactory;
}

export interface WebpageInfo {
  url?: string;
}

export type ExtractedData = Record<string, string | null>;
