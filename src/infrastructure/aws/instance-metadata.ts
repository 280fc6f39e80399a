import type { InstanceMetadata } from '../../domain/index.js';

const DEFAULT_ENDPOINT = 'http://169.254.169.254';
const TOKEN_TTL_SECONDS = 21600;
// Token is refreshed a minute before it expires
const TOKEN_REFRESH_MARGIN_MS = 60_000;
const DEFAULT_TIMEOUT_MS = 2000;

export interface InstanceMetadataClientOptions {
  endpoint?: string | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Instance metadata service client (IMDSv2).
 *
 * Every read carries a session token obtained with `PUT /latest/api/token`.
 * Requests are bounded by `timeoutMs` so a host without a metadata service
 * fails fast.
 */
export class InstanceMetadataClient implements InstanceMetadata {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(opts: InstanceMetadataClientOptions = {}) {
    this.endpoint = (opts.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async available(): Promise<boolean> {
    try {
      await this.instanceId();
      return true;
    } catch {
      return false;
    }
  }

  async instanceId(): Promise<string> {
    const id = await this.get('instance-id');
    if (id === null || id === '') {
      throw new Error('Instance metadata returned no instance-id');
    }
    return id;
  }

  spotTerminationTime(): Promise<string | null> {
    return this.get('spot/termination-time');
  }

  /** Reads a metadata path. Returns null when the path does not exist (404). */
  private async get(path: string): Promise<string | null> {
    const token = await this.sessionToken();
    const response = await fetch(`${this.endpoint}/latest/meta-data/${path}`, {
      headers: { 'X-aws-ec2-metadata-token': token },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new Error(`Instance metadata returned status ${response.status} for ${path}`);
    }
    return (await response.text()).trim();
  }

  private async sessionToken(): Promise<string> {
    if (this.token !== null && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const response = await fetch(`${this.endpoint}/latest/api/token`, {
      method: 'PUT',
      headers: { 'X-aws-ec2-metadata-token-ttl-seconds': String(TOKEN_TTL_SECONDS) },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Instance metadata token request returned status ${response.status}`);
    }

    const value = await response.text();
    this.token = { value, expiresAt: Date.now() + TOKEN_TTL_SECONDS * 1000 - TOKEN_REFRESH_MARGIN_MS };
    return value;
  }
}
