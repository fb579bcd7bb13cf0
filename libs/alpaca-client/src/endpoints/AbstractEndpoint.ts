import type { AlpacaClient, AlpacaRequest } from '../alpacaClient';
import type { CallOptions } from '../types';

export type EndpointRequest<T> = Omit<AlpacaRequest<T>, 'operation' | 'signal' | 'resilience'>;

/**
 * Base for endpoint groups: holds the client the group talks through and the
 * path prefix its operations live under.
 */
export abstract class AbstractEndpoint {
  protected constructor(
    protected readonly client: AlpacaClient,
    protected readonly basePath: string,
    private readonly group: string,
  ) {}

  /** `basePath` followed by each segment, URL-encoded. */
  protected path(...segments: Array<string | number>): string {
    return [this.basePath, ...segments.map((segment) => encodeURIComponent(String(segment)))].join('/');
  }

  protected call<T>(operation: string, request: EndpointRequest<T>, options: CallOptions = {}): Promise<T> {
    return this.client.request({
      ...request,
      operation: `${this.group}.${operation}`,
      signal: options.signal,
      resilience: options.resilience,
    });
  }
}

export const decimal = (value?: number | string): string | undefined =>
  value === undefined ? undefined : String(value);
