import { AxiosAdapter, AxiosError, AxiosResponse } from 'axios';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
}

export type FakeReply = { status: number; body?: unknown } | { networkError: string };

/**
 * In-process axios transport. Error statuses reject the way axios' own
 * adapters do once `validateStatus` fails.
 */
export function fakeAdapter(handler: (request: RecordedRequest, index: number) => FakeReply): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const data: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    const request: RecordedRequest = {
      method: config.method ?? 'get',
      url: config.url ?? '',
      params: { ...config.params },
      data,
    };
    requests.push(request);

    const reply = handler(request, requests.length - 1);
    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, AxiosError.ECONNABORTED, config);
    }
    const response: AxiosResponse = {
      data: reply.body,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response,
      );
    }
    return response;
  };
  return { adapter, requests };
}

export async function captureError(promise: Promise<unknown>): Promise<Error> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof Error) return error;
    throw error;
  }
  throw new Error('expected the promise to reject');
}
