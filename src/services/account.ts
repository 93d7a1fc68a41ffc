import logger from '../utils/logger';
import { ApiError, DecodeError } from '../utils/errorHandler';
import { fieldErrorsFromZod, parseRequest } from '../utils/validation';
import { AccountCostsQuery, ResourcePack, accountCostsDataSchema, accountCostsQuerySchema } from '../types/requests';
import { KlingHttpClient } from './httpClient';

export const ACCOUNT_COSTS_PATH = '/account/costs';

/**
 * Resource pack inquiry. The upstream service asks callers to keep this
 * endpoint at one request per second or less.
 */
export class AccountApi {
  constructor(private readonly http: KlingHttpClient) {}

  async getCosts(query: AccountCostsQuery): Promise<ResourcePack[]> {
    const { startTime, endTime, resourcePackName } = parseRequest(accountCostsQuerySchema, query, 'account costs');

    const data = await this.http.request(
      {
        method: 'GET',
        path: ACCOUNT_COSTS_PATH,
        query: { start_time: startTime, end_time: endTime, resource_pack_name: resourcePackName }
      },
      { family: 'account', operation: 'getCosts' }
    );

    const parsed = accountCostsDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new DecodeError('Account costs response does not match the expected shape', {
        details: { fieldErrors: fieldErrorsFromZod(parsed.error) }
      });
    }
    if (parsed.data.code !== 0) {
      throw new ApiError(parsed.data.msg ?? 'Account costs inquiry failed', { code: parsed.data.code });
    }

    const packs = parsed.data.resource_pack_subscribe_infos.map((pack) => ({
      name: pack.resource_pack_name,
      id: pack.resource_pack_id,
      type: pack.resource_pack_type,
      totalQuantity: pack.total_quantity,
      remainingQuantity: pack.remaining_quantity,
      purchaseTime: pack.purchase_time,
      effectiveTime: pack.effective_time,
      invalidTime: pack.invalid_time,
      status: pack.status
    }));

    logger.info('Fetched account resource packs', { count: packs.length });
    return packs;
  }
}
