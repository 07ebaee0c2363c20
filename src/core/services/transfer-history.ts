import { FETCH_CONFIG } from '../../config/constants';
import { DataSourceGateway, TransferPage } from '../../types/gateway';
import { TransferEvent, TransferHistory } from '../../types/transfer';
import { AddressRegistry } from '../normalization/address-registry';
import { normalizeTransfers } from '../normalization/transfer-normalizer';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('TransferHistory');

/**
 * Walks the paginated token-transfer endpoint, newest page first, for at most
 * `maxPages` pages. A failure on the first page propagates; a later failure
 * ends the walk and marks the history incomplete.
 */
export async function fetchTransferHistory(
  gateway: DataSourceGateway,
  address: string,
  registry: AddressRegistry,
  maxPages: number = FETCH_CONFIG.DEFAULT_MAX_TRANSFER_PAGES,
): Promise<TransferHistory> {
  const events: TransferEvent[] = [];
  let droppedRecords = 0;
  let pagesFetched = 0;
  let pageToken: string | undefined;
  let isComplete = false;

  while (pagesFetched < maxPages) {
    let page: TransferPage;
    try {
      page = await gateway.fetchTransferPage(address, pageToken);
    } catch (error) {
      if (pagesFetched === 0) throw error;
      logger.warn(`Transfer walk for ${address} stopped at page ${pagesFetched + 1}: ${errorMessage(error)}`);
      break;
    }
    pagesFetched++;

    const batch = normalizeTransfers(page.items, address, registry);
    events.push(...batch.events);
    droppedRecords += batch.dropped;

    if (page.items.length === 0 || !page.nextPageToken) {
      isComplete = true;
      break;
    }
    pageToken = page.nextPageToken;
  }

  logger.info(
    `Fetched ${events.length} transfers for ${address} from ${pagesFetched} page(s) (complete: ${isComplete})`,
  );
  return { events, isComplete, pagesFetched, droppedRecords };
}
