import { jest, describe, test, expect, beforeEach } from '@jest/globals';

jest.mock('../../utils/logger.js', () => ({
  __esModule: true,
  default: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    browser: {
      action: jest.fn(),
      error: jest.fn()
    }
  }
}));

import logger from '../../utils/logger.js';
import { AmazonBook, COVER_LOCATOR, TITLE_LOCATOR } from '../../sites/amazon.js';
import { describeLocator } from '../../core/session/types.js';
import { FakeSession } from '../utils/fakeSession.js';

const BOOK_URL = 'https://books.test/dp/0000000001/';
const TITLE = describeLocator(TITLE_LOCATOR);
const COVER = describeLocator(COVER_LOCATOR);

describe('AmazonBook', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('registers title and cover parsers in order', () => {
    const book = new AmazonBook({ session: new FakeSession() });

    expect(book.routineNames()).toEqual(['parseTitle', 'parseCoverUrl']);
  });

  test('parses title and cover url', async () => {
    const session = new FakeSession({
      [BOOK_URL]: {
        elements: {
          [TITLE]: { innerHTML: '\n    Book A\n  ' },
          [COVER]: { src: 'https://images.books.test/cover-a.jpg' }
        }
      }
    });

    const book = await AmazonBook.fromAddress(BOOK_URL, { session });

    expect(book.data).toEqual({
      title: 'Book A',
      cover_url: 'https://images.books.test/cover-a.jpg'
    });
    expect(book.failures).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith('[OK] Parses book title.');
    expect(logger.info).toHaveBeenCalledWith('[OK] Parses url of book cover image.');
  });

  test('records a missing cover without touching the title', async () => {
    const session = new FakeSession({
      [BOOK_URL]: {
        elements: {
          [TITLE]: { innerHTML: 'Book A' },
          [COVER]: { src: null }
        }
      }
    });

    const book = await AmazonBook.fromAddress(BOOK_URL, { session });

    expect(book.data).toEqual({ title: 'Book A' });
    expect(book.failures).toEqual(['Cover url not found.']);
    expect(logger.warn).toHaveBeenCalledWith('[FAIL] Parses url of book cover image.');
  });

  test('a missing title element still lets the cover parser run', async () => {
    const session = new FakeSession({
      [BOOK_URL]: {
        elements: {
          [COVER]: { src: 'https://images.books.test/cover-a.jpg' }
        }
      }
    });

    const book = await AmazonBook.fromAddress(BOOK_URL, { session });

    expect(book.data).toEqual({ cover_url: 'https://images.books.test/cover-a.jpg' });
    expect(book.failures).toEqual([
      "Parses book title. failed: No element matches xpath=//span[@id='productTitle'][1]"
    ]);
  });

  test('single parsers can be run by hand after get', async () => {
    const session = new FakeSession({
      [BOOK_URL]: { elements: { [TITLE]: { innerHTML: 'Book A' } } }
    });
    const book = new AmazonBook({ session });

    await book.get(BOOK_URL);
    const result = await book.parseTitle();

    expect(result).toBeNull();
    expect(book.data.title).toBe('Book A');
    expect(session.lookups).toEqual([TITLE]);
  });
});
