import { FEED_LAYOUTS } from '../config/feeds.js';
import { MissingInputError } from '../lib/errors.js';
import { fileExists, readText } from '../lib/fs.js';
import { log } from '../lib/log.js';
import { decodeFeed } from './csvFeed.js';
import type { RawRecord } from './rawRecord.js';

export interface FeedPaths {
  applicationsPath: string;
  lmsPath: string;
}

export interface LoadedFeeds {
  applicationsRaw: RawRecord[];
  lmsRaw: RawRecord[];
}

export async function assertFeedsExist(paths: FeedPaths): Promise<void> {
  if (!(await fileExists(paths.applicationsPath))) {
    throw new MissingInputError('applications', paths.applicationsPath);
  }
  if (!(await fileExists(paths.lmsPath))) {
    throw new MissingInputError('lms', paths.lmsPath);
  }
}

export async function loadFeeds(paths: FeedPaths): Promise<LoadedFeeds> {
  await assertFeedsExist(paths);

  log.info('Loading raw feeds...', paths);
  const applicationsRaw = decodeFeed(await readText(paths.applicationsPath), FEED_LAYOUTS.applications);
  const lmsRaw = decodeFeed(await readText(paths.lmsPath), FEED_LAYOUTS.lms);

  const lmsWithOverflow = lmsRaw.filter((record) =>
    record.overflow.some((cell) => cell !== null && cell.trim().length > 0)
  ).length;
  if (lmsWithOverflow > 0) {
    log.warn('lms feed has rows with cells past the header; extra cells are ignored', {
      rows: lmsWithOverflow
    });
  }

  log.info('loaded raw feeds', {
    applications: applicationsRaw.length,
    lms: lmsRaw.length
  });

  return { applicationsRaw, lmsRaw };
}
