/** Claims this API reads from an Azure AD access token. */
export interface AzureTokenClaims {
  oid?: string;
  upn?: string;
  preferred_username?: string;
  name?: string;
  aud?: string | string[];
  iss?: string;
  tid?: string;
  roles?: string[];
  iat?: number;
  exp?: number;
}
