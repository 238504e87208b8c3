import { PageExtractor } from '../core/extraction/PageExtractor.js';
import { PageExtractorOptions } from '../core/extraction/types.js';
import { byXPath } from '../core/session/types.js';

export const TITLE_LOCATOR = byXPath("//span[@id='productTitle'][1]");
export const COVER_LOCATOR = byXPath("//img[@id='imgBlkFront'][1]");

/**
 * Amazon book page.
 *
 * Parses:
 *  - title
 *  - cover_url
 */
export class AmazonBook extends PageExtractor {
  constructor(options?: PageExtractorOptions) {
    super(options);

    this.addRoutine({
      name: 'parseTitle',
      description: 'Parses book title.',
      fields: ['title'],
      run: () => this.parseTitle()
    });
    this.addRoutine({
      name: 'parseCoverUrl',
      description: 'Parses url of book cover image.',
      fields: ['cover_url'],
      run: () => this.parseCoverUrl()
    });
  }

  async parseTitle(): Promise<string | null> {
    const title = (await this.readAttribute(TITLE_LOCATOR, 'innerHTML'))?.trim() ?? null;
    this.data.title = title;
    return title ? null : 'Title not found.';
  }

  async parseCoverUrl(): Promise<string | null> {
    const coverUrl = await this.readAttribute(COVER_LOCATOR, 'src');
    this.data.cover_url = coverUrl;
    return coverUrl ? null : 'Cover url not found.';
  }
}
