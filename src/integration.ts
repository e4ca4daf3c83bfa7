import { defineIntegration } from 'astro-integration-kit';
import { z } from 'astro/zod';
import { validateConfig, indieHubConfigSchema } from './validators/config.js';
import type { ResolvedConfig } from './types/config.js';

const PACKAGE = 'astro-indiehub';

/**
 * Route pattern for an endpoint URL on the site
 */
function patternOf(endpoint: string): string {
  return new URL(endpoint).pathname.replace(/\/$/, '') || '/';
}

export default defineIntegration({
  name: PACKAGE,
  optionsSchema: indieHubConfigSchema,
  setup({ options }) {
    return {
      hooks: {
        'astro:config:setup': (params) => {
          const { config, logger, injectRoute, updateConfig } = params;

          let resolvedConfig: ResolvedConfig;
          try {
            resolvedConfig = validateConfig(options);
          } catch (error) {
            if (error instanceof z.ZodError) {
              logger.error('Invalid IndieHub configuration:');
              error.errors.forEach((err) => {
                logger.error(`  - ${err.path.join('.')}: ${err.message}`);
              });
              throw new Error('Invalid IndieHub configuration. Please check the errors above.');
            }
            throw error;
          }

          if (config.site && new URL(config.site).origin !== new URL(resolvedConfig.site.me).origin) {
            logger.warn(
              `site.me (${resolvedConfig.site.me}) is not on the Astro site (${config.site}); endpoints are advertised under site.me`
            );
          }

          logger.info('Configuring IndieHub integration...');

          const { micropub, indieauth, webmention, websub } = resolvedConfig;
          const routes: Array<[string, string]> = [
            [patternOf(micropub.endpoint), 'micropub'],
            [patternOf(indieauth.authorizationEndpoint), 'auth'],
            [`${patternOf(indieauth.authorizationEndpoint)}/approve`, 'auth-approve'],
            [patternOf(indieauth.tokenEndpoint), 'token'],
            [patternOf(indieauth.introspectionEndpoint), 'token-introspect'],
            [patternOf(indieauth.revocationEndpoint), 'token-revoke'],
            [patternOf(indieauth.metadataEndpoint), 'metadata'],
            [patternOf(webmention.endpoint), 'webmention'],
            [`${patternOf(webmention.endpoint)}/[uuid]`, 'webmention-status'],
            [patternOf(websub.endpoint), 'websub'],
          ];

          for (const [pattern, route] of routes) {
            injectRoute({
              pattern,
              entrypoint: `${PACKAGE}/routes/${route}`,
              prerender: false,
            });
            logger.info(`${route} endpoint: ${pattern}`);
          }

          // Make configuration available to routes via Vite
          updateConfig({
            vite: {
              define: {
                __INDIEHUB_CONFIG__: JSON.stringify(resolvedConfig),
              },
            },
          });

          if (websub.feeds.length === 0) {
            logger.info('No WebSub feeds configured; the hub accepts no subscriptions');
          }
          logger.info('IndieHub integration configured successfully');
        },
      },
    };
  },
});
