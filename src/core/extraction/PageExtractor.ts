import logger from '../../utils/logger.js';
import {
  ExtractionFailure,
  NavigationError,
  SessionAcquisitionError,
  describeError
} from '../errors.js';
import { defaultSessionFactory } from '../session/playwrightSession.js';
import { BrowserSession, Locator, SessionFactory } from '../session/types.js';
import {
  ExtractedData,
  ExtractionRoutine,
  PageExtractorOptions,
  RoutineResult,
  WebpageInfo
} from './types.js';

/**
 * Base class for page parsers.
 *
 * A subclass registers its routines in the constructor with `addRoutine`;
 * each routine reads the current page through `this.session` (usually via
 * `readAttribute`), writes into `this.data` and returns an error message or
 * nothing. `runExtractions` runs every routine once, in registration order,
 * and keeps going when one of them fails.
 *
 * ```ts
 * class ProductPage extends PageExtractor {
 *   constructor(options?: PageExtractorOptions) {
 *     super(options);
 *     this.addRoutine({
 *       name: 'parseName',
 *       description: 'Parses product name.',
 *       fields: ['name'],
 *       run: async () => {
 *         this.data.name = await this.readAttribute(byCss('h1'), 'textContent');
 *         return this.data.name ? null : 'Name not found.';
 *       }
 *     });
 *   }
 * }
 *
 * const page = await ProductPage.fromAddress('https://shop.test/item/1');
 * ```
 *
 * A routine that fails leaves none of its fields in `data`.
 */
export abstract class PageExtractor {
  data: ExtractedData = {};
  failures: string[] = [];
  failureDetails: ExtractionFailure[] = [];
  webpage: WebpageInfo = {};

  protected session: BrowserSession | null;
  private readonly sessionFactory: SessionFactory;
  private readonly routines: ExtractionRoutine[] = [];
  // Keys of `data` each routine has filled since the last navigation
  private readonly writtenFields = new Map<string, Set<string>>();

  constructor(options: PageExtractorOptions = {}) {
    this.session = options.session ?? null;
    this.sessionFactory = options.sessionFactory ?? defaultSessionFactory;
  }

  /**
   * Constructs the extractor, loads `address` and runs every routine.
   */
  static async fromAddress<T extends PageExtractor>(
    this: new (options?: PageExtractorOptions) => T,
    address: string,
    options?: PageExtractorOptions
  ): Promise<T> {
    const extractor = new this(options);
    await extractor.load(address);
    return extractor;
  }

  protected addRoutine(routine: ExtractionRoutine): void {
    if (this.routines.some(existing => existing.name === routine.name)) {
      throw new Error(`Routine ${routine.name} is already registered`);
    }
    this.routines.push(routine);
  }

  routineNames(): string[] {
    return this.routines.map(routine => routine.name);
  }

  async ensureSession(): Promise<BrowserSession> {
    if (this.session && this.session.isOpen()) {
      return this.session;
    }

    try {
      this.session = await this.sessionFactory();
    } catch (error) {
      logger.warn('[FAIL] init browser session');
      logger.info(describeError(error));
      throw new SessionAcquisitionError(`Could not open a browser session: ${describeError(error)}`, error);
    }
    logger.info('[OK] init browser session');
    return this.session;
  }

  /**
   * Opens `address` in the browser. Results of the previous page are discarded
   * first, so a failed navigation leaves the extractor empty.
   */
  async navigate(address: string): Promise<void> {
    this.data = {};
    this.failures = [];
    this.failureDetails = [];
    this.writtenFields.clear();
    this.webpage = { url: address };

    const session = await this.ensureSession();
    try {
      await session.navigate(address);
    } catch (error) {
      logger.warn(`[FAIL] get webpage ${address}`);
      logger.info(describeError(error));
      throw new NavigationError(address, error);
    }
    logger.info(`[OK] get webpage ${address}`);
  }

  get(address: string): Promise<void> {
    return this.navigate(address);
  }

  /**
   * Runs the given routines (all registered ones by default) and returns the
   * failure messages of this run. Never throws for a routine's failure.
   */
  async runExtractions(routines: readonly ExtractionRoutine[] = this.routines): Promise<string[]> {
    this.failures = [];
    this.failureDetails = [];

    for (const routine of routines) {
      const label = routineLabel(routine);
      const before = { ...this.data };

      let outcome: RoutineResult;
      try {
        outcome = await routine.run();
      } catch (error) {
        logger.warn(`[FAIL] ${label}`);
        logger.info(describeError(error));
        this.recordFailure(routine, `${label} failed: ${describeError(error)}`, before, error);
        continue;
      }

      if (outcome) {
        logger.warn(`[FAIL] ${label}`);
        logger.info(outcome);
        this.recordFailure(routine, outcome, before);
      } else {
        logger.info(`[OK] ${label}`);
        this.rememberWrites(routine, before);
      }
    }

    return [...this.failures];
  }

  parse(routines?: readonly ExtractionRoutine[]): Promise<string[]> {
    return this.runExtractions(routines);
  }

  /**
   * Navigates to `address`, then runs the routines. Navigation errors propagate
   * and no routine runs.
   */
  async load(address: string, routines?: readonly ExtractionRoutine[]): Promise<this> {
    await this.navigate(address);
    await this.runExtractions(routines);
    return this;
  }

  /**
   * Closes the browser session. The session is dropped even when closing fails.
   */
  async close(): Promise<boolean> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return true;
    }

    try {
      await session.close();
    } catch (error) {
      logger.warn('[FAIL] close webpage.');
      logger.info(describeError(error));
      return false;
    }
    logger.info('[OK] close webpage.');
    return true;
  }

  /**
   * Loads the page, runs the routines and closes the session. True when every
   * routine succeeded and the session closed cleanly.
   */
  async getParseClose(address: string, routines?: readonly ExtractionRoutine[]): Promise<boolean> {
    let closed = false;
    try {
      await this.load(address, routines);
    } finally {
      closed = await this.close();
    }
    return this.failures.length === 0 && closed;
  }

  protected async readAttribute(locator: Locator, attribute: string): Promise<string | null> {
    const session = await this.ensureSession();
    const element = await session.findElement(locator);
    return element.getAttribute(attribute);
  }

  private rememberWrites(routine: ExtractionRoutine, before: ExtractedData): void {
    const written = this.writtenFields.get(routine.name) ?? new Set<string>();
    for (const key of changedKeys(before, this.data)) {
      written.add(key);
    }
    this.writtenFields.set(routine.name, written);
  }

  private recordFailure(
    routine: ExtractionRoutine,
    message: string,
    before: ExtractedData,
    cause?: unknown
  ): void {
    // A failed routine leaves no value behind, stale or partial
    const stale = [
      ...changedKeys(before, this.data),
      ...(routine.fields ?? []),
      ...(this.writtenFields.get(routine.name) ?? [])
    ];
    for (const key of stale) {
      delete this.data[key];
    }
    this.writtenFields.delete(routine.name);

    this.failures.push(message);
    this.failureDetails.push(new ExtractionFailure(routine.name, message, cause));
  }
}

function changedKeys(before: ExtractedData, after: ExtractedData): string[] {
  return Object.keys(after).filter(key => !(key in before) || before[key] !== after[key]);
}

function routineLabel(routine: ExtractionRoutine): string {
  const firstLine = routine.description?.split('\n')[0].trim();
  return firstLine || routine.name;
}
