import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { SubscriberNotFoundError } from '../common/errors';
import { LoggerService } from '../common/logger.service';
import { SubscribersService } from '../subscribers/subscribers.service';
import { checkOutboundUrl, HostResolver, pinnedLookup, resolveHost } from './url-guard';

export interface ForwardResult {
  url: string;
  status: number;
}

export const FORWARD_USER_AGENT = 'subscriber-relay-bot/1.0';

@Injectable()
export class ForwardService {
  private readonly http: AxiosInstance;
  private readonly allowedHosts: string[];
  resolve: HostResolver = resolveHost;

  constructor(
    private readonly config: ConfigService,
    private readonly logger: LoggerService,
    private readonly subscribers: SubscribersService
  ) {
    this.allowedHosts = this.config.get<string[]>('forwardAllowedHosts') || [];
    this.http = axios.create({
      timeout: this.config.get<number>('forwardTimeoutMs') || 10_000,
      maxRedirects: 0,
      headers: { 'User-Agent': FORWARD_USER_AGENT }
    });
  }

  get client(): AxiosInstance {
    return this.http;
  }

  /**
   * Posts the caller's own subscriber record to `rawUrl` once the URL passed the
   * SSRF guard. A resolved host is connected to at the address the guard approved.
   */
  async forwardSubscriber(chatId: number, rawUrl: string): Promise<ForwardResult> {
    const { url, address } = await checkOutboundUrl(rawUrl, {
      allowedHosts: this.allowedHosts,
      resolve: this.resolve
    });

    const record = await this.subscribers.get(chatId);
    if (!record) throw new SubscriberNotFoundError(chatId);

    const requestConfig: AxiosRequestConfig = address ? { lookup: pinnedLookup(address) } : {};
    const response = await this.http.post(url.toString(), { chat_id: chatId, ...record }, requestConfig);
    this.logger.log('Subscriber record forwarded', { chatId, host: url.hostname, status: response.status });
    return { url: url.toString(), status: response.status };
  }
}
