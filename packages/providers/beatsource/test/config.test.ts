import { describe, expect, it } from 'vitest';

import { BROWSER_USER_AGENT, WEB_PLAYER_CLIENT_ID, resolveBeatsourceConfig } from '../src/config.ts';

describe('resolveBeatsourceConfig', () => {
  it('fills in every default, the web player client id included', () => {
    expect(resolveBeatsourceConfig({}, {})).toEqual({
      apiUrl: 'https://api.beatsource.com/v4/',
      clientId: WEB_PLAYER_CLIENT_ID,
      userAgent: BROWSER_USER_AGENT,
      perPage: 100,
      coverSize: 1400,
      disableSubscriptionCheck: false,
      retries: 3,
      retryBaseMs: 300,
    });
  });

  it('reads the environment', () => {
    const config = resolveBeatsourceConfig(
      {},
      {
        BEATSOURCE_CLIENT_ID: 'env-client',
        BEATSOURCE_API_URL: 'https://api.example.test/v4',
        BEATSOURCE_PER_PAGE: '25',
        BEATSOURCE_DISABLE_SUBSCRIPTION_CHECK: '1',
        PROVIDER_HTTP_RETRIES: '1',
      },
    );

    expect(config).toMatchObject({
      clientId: 'env-client',
      apiUrl: 'https://api.example.test/v4/',
      perPage: 25,
      disableSubscriptionCheck: true,
      retries: 1,
    });
  });

  it('prefers explicit overrides over the environment', () => {
    const config = resolveBeatsourceConfig(
      { clientId: 'test-client', coverSize: 600, perPage: undefined },
      { BEATSOURCE_CLIENT_ID: 'env-client', BEATSOURCE_PER_PAGE: '50' },
    );

    expect(config).toMatchObject({ clientId: 'test-client', coverSize: 600, perPage: 50 });
  });

  it('rejects an empty client id override', () => {
    expect(() => resolveBeatsourceConfig({ clientId: '' }, {})).toThrow(
      /^Invalid Beatsource configuration: clientId: /,
    );
  });

  it('rejects page sizes the API does not serve', () => {
    expect(() => resolveBeatsourceConfig({}, { BEATSOURCE_PER_PAGE: '500' })).toThrow(
      /^Invalid Beatsource configuration: BEATSOURCE_PER_PAGE: /,
    );
  });
});
