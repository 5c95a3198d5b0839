// src/services/graph/graph.client.ts
import axios, { AxiosError, AxiosInstance } from 'axios';
import type { DirectoryClient, DirectoryUser, DirectoryUserUpdate } from '../../types/directory.types';
import { UpstreamError } from '../../utils/errors';

export const USER_SELECT_FIELDS = [
  'id',
  'userPrincipalName',
  'displayName',
  'givenName',
  'surname',
  'jobTitle',
  'department',
  'officeLocation',
  'mail',
  'businessPhones',
  'mobilePhone',
  'streetAddress',
  'city',
  'state',
  'postalCode',
  'country',
  'countryLetterCode',
].join(',');

/** Tokens are refreshed this long before Azure says they expire. */
const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

export interface GraphClientOptions {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  http?: AxiosInstance;
  now?: () => number;
}

interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

interface UserPage {
  value?: DirectoryUser[];
  '@odata.nextLink'?: string;
}

/**
 * Microsoft Graph client using the client-credentials flow. Requires the
 * app registration to hold User.Read.All and User.ReadWrite.All.
 */
export class GraphClient implements DirectoryClient {
  private readonly http: AxiosInstance;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(private readonly options: GraphClientOptions) {
    this.http = options.http ?? axios.create({ timeout: 30000 });
    this.now = options.now ?? Date.now;
  }

  async getAllUsers(): Promise<DirectoryUser[]> {
    const users: DirectoryUser[] = [];
    let url: string | undefined = `${this.options.baseUrl}/users?$select=${USER_SELECT_FIELDS}`;

    while (url) {
      const page: UserPage = await this.request<UserPage>('GET', url);
      users.push(...(page.value ?? []));
      url = page['@odata.nextLink'];
    }

    return users;
  }

  getUser(userId: string): Promise<DirectoryUser> {
    return this.request<DirectoryUser>(
      'GET',
      `${this.options.baseUrl}/users/${encodeURIComponent(userId)}?$select=${USER_SELECT_FIELDS}`
    );
  }

  /** PATCHes the user, then reads it back since Graph answers 204. */
  async updateUser(userId: string, update: DirectoryUserUpdate): Promise<DirectoryUser> {
    await this.request('PATCH', `${this.options.baseUrl}/users/${encodeURIComponent(userId)}`, update);
    return this.getUser(userId);
  }

  private async accessToken(): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const form = new URLSearchParams({
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      scope: 'https://graph.microsoft.com/.default',
      grant_type: 'client_credentials',
    });

    try {
      const { data } = await this.http.post<TokenResponse>(
        `https://login.microsoftonline.com/${this.options.tenantId}/oauth2/v2.0/token`,
        form.toString(),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
      );

      const lifetimeMs = (data.expires_in ?? 3600) * 1000;
      this.token = { value: data.access_token, expiresAt: this.now() + lifetimeMs - TOKEN_EXPIRY_MARGIN_MS };
      return data.access_token;
    } catch (err) {
      throw toUpstreamError('Failed to acquire Microsoft Graph token', err);
    }
  }

  private async request<T>(method: 'GET' | 'PATCH', url: string, body?: unknown): Promise<T> {
    const token = await this.accessToken();

    try {
      const { data } = await this.http.request<T>({
        method,
        url,
        data: body,
        headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json' },
      });
      return data;
    } catch (err) {
      throw toUpstreamError(`Microsoft Graph ${method} request failed`, err);
    }
  }
}

function toUpstreamError(message: string, err: unknown): UpstreamError {
  if (err instanceof AxiosError) {
    return new UpstreamError(message, { status: err.response?.status ?? null, reason: err.message });
  }
  return new UpstreamError(message, { reason: err instanceof Error ? err.message : String(err) });
}
