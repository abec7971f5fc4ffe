export interface Token {
  readonly accessToken: string;
  readonly tokenType: string; // 'Bearer' unless the API says otherwise
}

/**
 * Client credentials for the provider API. `token` is attached once login succeeds
 * and replaced wholesale on the next run.
 */
export interface Credentials {
  clientId: string;
  clientSecret: string;
  token?: Token;
}

export interface LoginResponse {
  access_token: string;
  token_type?: string;
}
