import { FETCH_CONFIG } from '../../config/constants';
import { RawLendingUser } from '../../types/lending';
import { DataSourceError } from '../utils/errors';
import { HttpClientOptions, HttpJsonClient, ResponseGuard } from './http-json-client';
import { isOptionalArray, isRecord } from './response-guards';

interface GraphQLResponse<T> {
  data?: T | null;
  errors?: Array<{ message?: string }>;
}

interface LendingUserData {
  user: RawLendingUser | null;
}

const LENDING_USER_QUERY = `
  query LendingUser($id: ID!) {
    user(id: $id) {
      id
      createdAt
      transactionCount
      orderCount
      transactions(first: ${FETCH_CONFIG.LENDING_TRANSACTIONS_FIRST}, orderBy: createdAt, orderDirection: desc) {
        id
        createdAt
        side
        currency
        maturity
        futureValue
        executionPrice
      }
      orders(first: ${FETCH_CONFIG.LENDING_ORDERS_FIRST}, orderBy: createdAt, orderDirection: desc) {
        id
        status
        side
        currency
        maturity
        createdAt
        inputAmount
        filledAmount
      }
    }
  }
`;

function isGraphQLResponse(body: unknown): body is GraphQLResponse<unknown> {
  return isRecord(body) && (body.data === undefined || body.data === null || isRecord(body.data)) && isOptionalArray(body.errors);
}

const isLendingUserData: ResponseGuard<LendingUserData> = (data): data is LendingUserData =>
  isRecord(data) &&
  (data.user === null ||
    (isRecord(data.user) && isOptionalArray(data.user.transactions) && isOptionalArray(data.user.orders)));

/** GraphQL client for the lending protocol subgraph. */
export class SubgraphClient extends HttpJsonClient {
  constructor(options: HttpClientOptions) {
    super('SubgraphClient', options);
  }

  async query<T>(query: string, variables: Record<string, unknown>, guard: ResponseGuard<T>): Promise<T> {
    const response = await this.post('', { query, variables }, isGraphQLResponse);
    if (response.errors && response.errors.length > 0) {
      const messages = response.errors.map((e) => e.message ?? 'unknown error').join('; ');
      throw new DataSourceError(`GraphQL errors: ${messages}`, 'SubgraphClient', 'query');
    }
    if (!guard(response.data)) {
      throw new DataSourceError('GraphQL response data has an unexpected shape', 'SubgraphClient', 'query');
    }
    return response.data;
  }

  /** Null when the subgraph has never seen the address. */
  async getLendingUser(address: string): Promise<RawLendingUser | null> {
    const data = await this.query(LENDING_USER_QUERY, { id: address.toLowerCase() }, isLendingUserData);
    return data.user;
  }
}
