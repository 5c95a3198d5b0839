import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import { AzureTokenVerifier, createJwksKeyResolver, TokenVerifier } from '../services/auth';

export interface AuthPluginOptions {
  tokenVerifier?: TokenVerifier;
}

export default fp<AuthPluginOptions>(
  async function authPlugin(fastify: FastifyInstance, opts: AuthPluginOptions) {
    const { auth } = fastify.appConfig;

    fastify.decorate(
      'tokenVerifier',
      opts.tokenVerifier ??
        new AzureTokenVerifier(
          { audience: auth.audience, issuer: auth.issuer, clockToleranceSeconds: auth.clockToleranceSeconds },
          createJwksKeyResolver(auth.jwksUri)
        )
    );
  },
  { name: 'auth' }
);
