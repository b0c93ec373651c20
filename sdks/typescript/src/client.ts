import type {
  AttemptStats,
  Owner,
  RegisterOwnerRequest,
  RegisterOwnerResult,
  VerificationAttempt,
  VerificationResponse,
} from './types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface PlateRegistryClientOptions {
  baseUrl: string;
  fetchImpl?: FetchLike;
  headers?: Record<string, string>;
}

export class PlateRegistryError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'PlateRegistryError';
  }
}

/**
 * The service could not record or look up a scan. Distinct from a scan that
 * simply matched nobody.
 */
export class VerificationUnavailableError extends PlateRegistryError {
  constructor(message: string) {
    super(message, 503);
    this.name = 'VerificationUnavailableError';
  }
}

export class PlateRegistryClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly defaultHeaders: Record<string, string>;

  constructor(options: PlateRegistryClientOptions) {
    if (!options.baseUrl) {
      throw new Error('baseUrl is required');
    }
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = options.headers ?? {};
  }

  async verify(scannedText: string, confidence: number): Promise<VerificationResponse> {
    const response = await this.send('POST', '/verify', { scannedText, confidence });
    await this.ensureOk(response, 'Verify');
    return (await response.json()) as VerificationResponse;
  }

  async registerOwner(payload: RegisterOwnerRequest): Promise<RegisterOwnerResult> {
    const response = await this.send('POST', '/owners', payload);
    if (response.status === 409) {
      const body = (await response.json()) as { reason: 'duplicate_owner_id' | 'duplicate_plate_key'; message: string };
      return { registered: false, reason: body.reason, message: body.message };
    }
    if (response.status === 400) {
      return { registered: false, reason: 'invalid_input', message: await this.readErrorBody(response) };
    }
    await this.ensureOk(response, 'Register owner');
    return { registered: true, owner: (await response.json()) as Owner };
  }

  async listOwners(): Promise<Owner[]> {
    const response = await this.send('GET', '/owners');
    await this.ensureOk(response, 'List owners');
    return (await response.json()) as Owner[];
  }

  async findOwnerByPlate(plate: string): Promise<Owner | undefined> {
    if (!plate.trim()) {
      throw new Error('plate is required');
    }
    const response = await this.send('GET', `/owners/plate/${encodeURIComponent(plate)}`);
    if (response.status === 404) {
      return undefined;
    }
    await this.ensureOk(response, 'Find owner');
    return (await response.json()) as Owner;
  }

  async removeOwner(ownerId: string): Promise<boolean> {
    if (!ownerId) {
      throw new Error('ownerId is required');
    }
    const response = await this.send('DELETE', `/owners/${encodeURIComponent(ownerId)}`);
    if (response.status === 404) {
      return false;
    }
    await this.ensureOk(response, 'Remove owner');
    return true;
  }

  async recentAttempts(limit?: number): Promise<VerificationAttempt[]> {
    const query = limit === undefined ? '' : `?limit=${encodeURIComponent(String(limit))}`;
    const response = await this.send('GET', `/attempts${query}`);
    await this.ensureOk(response, 'Recent attempts');
    return (await response.json()) as VerificationAttempt[];
  }

  async attemptStats(): Promise<AttemptStats> {
    const response = await this.send('GET', '/attempts/stats');
    await this.ensureOk(response, 'Attempt stats');
    return (await response.json()) as AttemptStats;
  }

  private async send(method: string, path: string, payload?: unknown): Promise<Response> {
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: payload === undefined
        ? this.defaultHeaders
        : { 'Content-Type': 'application/json', ...this.defaultHeaders },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });
  }

  private async ensureOk(response: Response, operation: string): Promise<void> {
    if (response.ok) {
      return;
    }
    const body = await this.readErrorBody(response);
    if (response.status === 503) {
      throw new VerificationUnavailableError(`${operation} request failed: ${body}`);
    }
    throw new PlateRegistryError(`${operation} request failed with ${response.status}: ${body}`, response.status);
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      const text = await response.text();
      return text || '<empty>';
    } catch (err) {
      return `<failed to read error body: ${String(err)}>`;
    }
  }
}

export * from './types.js';
