import { ExtractedRecord, HarvestSource, RecordSchema } from '../../types/index.js';
import { buildPageUrl } from '../navigator.js';
import { ProfileScraper } from './profile-scraper.js';
import { ResultsPageReader } from './results-page.js';
import { ListingProvider } from './listing-providers.js';
import { DirectoryApiItem, describeDirectoryItem, mapDirectoryItem } from './directory-api.js';
import { DirectoryField, directorySchema } from './directory-selectors.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Results pages are scanned for profile links; each profile is visited
 */
export class ProfileLinkSource implements HarvestSource<string, DirectoryField> {
  readonly schema: RecordSchema<DirectoryField> = directorySchema;

  constructor(
    readonly name: string,
    private readonly seedUrl: string,
    private readonly reader: ResultsPageReader,
    private readonly profiles: ProfileScraper
  ) {}

  async listItems(pageNumber: number): Promise<string[]> {
    return this.reader.read(buildPageUrl(this.seedUrl, pageNumber));
  }

  async visit(profileUrl: string): Promise<ExtractedRecord<DirectoryField>> {
    return this.profiles.scrape(profileUrl);
  }

  describe(profileUrl: string): string {
    return profileUrl;
  }
}

/**
 * Profile values replace listing values when the profile has them
 */
export function mergeProfile(
  listing: ExtractedRecord<DirectoryField>,
  profile: ExtractedRecord<DirectoryField>
): ExtractedRecord<DirectoryField> {
  const merged = { ...listing };
  for (const field of directorySchema.fields) {
    if (field !== 'profileUrl' && profile[field]) {
      merged[field] = profile[field];
    }
  }
  return merged;
}

/**
 * Records come from the structured results API; profiles are visited only
 * to enrich them.
 */
export class ApiListingSource implements HarvestSource<DirectoryApiItem, DirectoryField> {
  readonly schema: RecordSchema<DirectoryField> = directorySchema;

  constructor(
    readonly name: string,
    private readonly provider: ListingProvider<DirectoryApiItem>,
    private readonly profiles: ProfileScraper | null
  ) {}

  async listItems(pageNumber: number): Promise<DirectoryApiItem[]> {
    return this.provider.fetchListing(pageNumber);
  }

  async visit(item: DirectoryApiItem): Promise<ExtractedRecord<DirectoryField>> {
    const record = mapDirectoryItem(item);

    if (!this.profiles || !record.profileUrl) {
      return record;
    }

    try {
      return mergeProfile(record, await this.profiles.scrape(record.profileUrl));
    } catch (error) {
      logger.warn('Profile enrichment failed, keeping listing data', {
        profileUrl: record.profileUrl,
        error: errorMessage(error),
      });
      return record;
    }
  }

  describe(item: DirectoryApiItem): string {
    return describeDirectoryItem(item);
  }
}
