/**
 * HttpNotificationTransport - POSTs a JSON payload to a webhook / events endpoint.
 *
 * Every HTTP status is returned to the caller (validateStatus accepts all); only
 * network-level failures reject.
 */

import axios, { AxiosInstance } from 'axios';
import type { INotificationTransport } from '../../types/NotificationTypes';
import { ConfigurationError } from '../../types/MonitorErrors';
import { Logger } from '../core/Logger';

export interface HttpNotificationTransportConfig {
  url: string;
  timeoutMs?: number;
  httpClient?: AxiosInstance;
}

export class HttpNotificationTransport implements INotificationTransport {
  private url: string;
  private httpClient: AxiosInstance;
  private logger: Logger;

  constructor(config: HttpNotificationTransportConfig, logger: Logger) {
    this.url = config.url;
    this.logger = logger;
    this.httpClient =
      config.httpClient ??
      axios.create({
        timeout: config.timeoutMs ?? 10000,
        headers: { 'Content-Type': 'application/json' },
        validateStatus: () => true,
      });
  }

  async postJson(payload: object): Promise<{ status: number; body: unknown }> {
    if (!this.url) {
      throw new ConfigurationError('Notification transport URL is not configured', 'TRANSPORT_URL_MISSING');
    }

    this.logger.info('Sending POST outbound request', { url: this.url, method: 'postJson' });

    const response = await this.httpClient.post<unknown>(this.url, payload);

    this.logger.info('Received POST response', {
      url: this.url,
      method: 'postJson',
      status_code: response.status,
    });

    return { status: response.status, body: response.data };
  }
}
