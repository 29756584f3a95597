// src/core/auth/AuthCore.ts

import type { ClientCredentials } from './types';
import { AccessTokenResponseSchema } from './types';
import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import { CatalogAuthError, errorMessage } from '../../utils/errors';

export const ACCESS_TOKEN_PATH = '/v1/auth/access_token';

/**
 * Exchanges client credentials for a catalog bearer token. The token is
 * obtained once and reused for the rest of the run; it is never refreshed.
 */
export class AuthCore {
  private accessToken?: string;

  constructor(
    private http: HttpCore,
    private baseUrl: string,
    private credentials: ClientCredentials,
    private logger: Logger
  ) {}

  /**
   * Obtain the run's token. Later calls return the same token.
   *
   * @throws {CatalogAuthError} If the token endpoint fails or answers without a token
   */
  async authenticate(): Promise<string> {
    if (this.accessToken) {
      return this.accessToken;
    }

    let data: unknown;
    try {
      const response = await this.http.post(
        `${this.baseUrl.replace(/\/+$/, '')}${ACCESS_TOKEN_PATH}`,
        { clientId: this.credentials.clientId, clientSecret: this.credentials.clientSecret },
        { upstream: 'catalog' }
      );
      data = response.data;
    } catch (error: unknown) {
      throw new CatalogAuthError(`Catalog authentication failed: ${errorMessage(error)}`);
    }

    const parsed = AccessTokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new CatalogAuthError('Catalog token response has no accessToken');
    }

    this.accessToken = parsed.data.accessToken;
    this.logger.info('Catalog access token obtained', { expiresIn: parsed.data.expiresIn });
    return this.accessToken;
  }
}
