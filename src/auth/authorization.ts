/**
 * Authorization header providers for the Sepehr API
 */

import crypto from 'crypto';
import OAuth from 'oauth-1.0a';
import type { SepehrAuthConfig } from '../types/config';

export interface SignableRequest {
  method: string;
  url: string;
  params: Record<string, string>;
}

/**
 * Produces the Authorization value for one outbound request
 */
export interface AuthorizationProvider {
  readonly scheme: SepehrAuthConfig['scheme'];
  authorize(request: SignableRequest): string;
}

/**
 * Sends an operator-supplied header verbatim
 */
export class StaticAuthorization implements AuthorizationProvider {
  readonly scheme = 'header';
  private readonly header: string;

  constructor(header: string) {
    this.header = header;
  }

  authorize(): string {
    return this.header;
  }
}

/**
 * OAuth 1.0 HMAC-SHA1 signing. Every call gets a fresh nonce and timestamp.
 */
export class OAuth1Authorization implements AuthorizationProvider {
  readonly scheme = 'oauth1';
  private readonly oauth: OAuth;
  private readonly token: OAuth.Token;

  constructor(consumerKey: string, consumerSecret: string, accessToken: string, tokenSecret: string) {
    this.oauth = new OAuth({
      consumer: { key: consumerKey, secret: consumerSecret },
      signature_method: 'HMAC-SHA1',
      hash_function(baseString, key) {
        return crypto.createHmac('sha1', key).update(baseString).digest('base64');
      },
    });
    this.token = { key: accessToken, secret: tokenSecret };
  }

  authorize(request: SignableRequest): string {
    const data = this.oauth.authorize(
      { url: request.url, method: request.method.toUpperCase(), data: request.params },
      this.token
    );
    return this.oauth.toHeader(data).Authorization;
  }
}

export function createAuthorizationProvider(auth: SepehrAuthConfig): AuthorizationProvider {
  switch (auth.scheme) {
    case 'header':
      return new StaticAuthorization(auth.authorization);
    case 'oauth1':
      return new OAuth1Authorization(
        auth.consumerKey,
        auth.consumerSecret,
        auth.accessToken,
        auth.tokenSecret
      );
  }
}
