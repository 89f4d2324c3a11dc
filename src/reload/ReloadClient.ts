/**
 * ReloadClient - Asks the live instance to reload its configuration
 *
 * Called after a push has been applied without failures. Each reload service
 * is requested once, in order, with a bounded timeout; a failing service is
 * reported and the next one is still attempted. Nothing here throws on a
 * network or HTTP failure.
 */

import { log } from '../utils/logger.js';
import { describeError } from '../errors/syncErrors.js';
import { requireReloadToken, SyncConfig, DEFAULT_RELOAD_TIMEOUT_MS } from '../config/syncConfig.js';

export interface ReloadService {
  /** Display name */
  name: string;
  /** Service path below /api/services/ */
  service: string;
}

/**
 * Services reloaded after every push
 */
export const RELOAD_SERVICES: readonly ReloadService[] = [
  { name: 'core configuration', service: 'homeassistant/reload_core_config' },
  { name: 'automations', service: 'automation/reload' },
  { name: 'scripts', service: 'script/reload' },
  { name: 'scenes', service: 'scene/reload' },
];

export type ReloadFailure = 'http' | 'timeout' | 'connection';

export interface ReloadServiceResult {
  name: string;
  service: string;
  success: boolean;
  status?: number;
  failure?: ReloadFailure;
  message?: string;
}

export interface ReloadReport {
  success: boolean;
  results: ReloadServiceResult[];
}

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

export interface ReloadClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  services?: readonly ReloadService[];
  /** Replaceable in tests (defaults to global fetch) */
  fetchFn?: FetchFunction;
}

/**
 * ReloadClient class for the reload-notification endpoint
 */
export class ReloadClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly services: readonly ReloadService[];
  private readonly fetchFn: FetchFunction;

  constructor(options: ReloadClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RELOAD_TIMEOUT_MS;
    this.services = options.services ?? RELOAD_SERVICES;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
  }

  /**
   * Create a client from configuration
   *
   * @throws ConfigError when no token is configured
   */
  static fromConfig(config: SyncConfig, fetchFn?: FetchFunction): ReloadClient {
    return new ReloadClient({
      baseUrl: config.reload.url,
      token: requireReloadToken(config),
      timeoutMs: config.reload.timeoutMs,
      fetchFn
    });
  }

  /**
   * Reload every configured service
   *
   * @returns Per-service results; success only when all succeeded
   */
  async reloadAll(): Promise<ReloadReport> {
    const results: ReloadServiceResult[] = [];

    for (const service of this.services) {
      results.push(await this.reload(service));
    }

    const success = results.every(result => result.success);
    log.info(`[RELOAD] ${results.filter(r => r.success).length}/${results.length} services reloaded`);

    return { success, results };
  }

  /**
   * Reload one service
   */
  async reload(service: ReloadService): Promise<ReloadServiceResult> {
    const url = `${this.baseUrl}/api/services/${service.service}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    log.info(`[RELOAD] Reloading ${service.name}...`);

    try {
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.token}`,
          'Content-Type': 'application/json'
        },
        signal: controller.signal
      });

      if (response.status === 200) {
        return { ...service, success: true, status: response.status };
      }

      const body = await readBody(response);
      log.warn(`[RELOAD] Failed to reload ${service.name}: ${response.status}`);
      return {
        ...service,
        success: false,
        status: response.status,
        failure: 'http',
        message: body ? `HTTP ${response.status}: ${body}` : `HTTP ${response.status}`
      };

    } catch (error) {
      if (controller.signal.aborted) {
        log.warn(`[RELOAD] Timeout reloading ${service.name} after ${this.timeoutMs}ms`);
        return {
          ...service,
          success: false,
          failure: 'timeout',
          message: `No response within ${this.timeoutMs}ms (a configuration error may be preventing the reload)`
        };
      }

      log.warn(`[RELOAD] Cannot reach ${this.baseUrl}: ${describeError(error)}`);
      return {
        ...service,
        success: false,
        failure: 'connection',
        message: `Cannot reach ${this.baseUrl}: ${describeError(error)}`
      };

    } finally {
      clearTimeout(timeout);
    }
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return (await response.text()).trim();
  } catch (error) {
    log.debug(`[RELOAD] Unreadable response body: ${describeError(error)}`);
    return '';
  }
}
