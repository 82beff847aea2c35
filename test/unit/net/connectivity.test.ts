import { probeConnectivity } from '../../../src/net/connectivity.js';
import { resolveLatestTag } from '../../../src/net/releases.js';
import { createLogger } from '../../../src/logger.js';
import { StubHttp } from '../../helpers/context.js';

const URLS = ['https://github.com', 'https://deb.debian.org', 'https://www.google.com'];
const logger = createLogger();

describe('probeConnectivity', () => {
  it('stops at the first host that answers', async () => {
    const http = new StubHttp({ 'https://deb.debian.org': 301, 'https://www.google.com': 200 });
    const report = await probeConnectivity(http, URLS, 5000, logger);
    expect(report).toEqual({ reachable: 'https://deb.debian.org', failed: ['https://github.com'] });
    expect(http.requested).toEqual(['https://github.com', 'https://deb.debian.org']);
  });

  it('treats any HTTP status as reachable', async () => {
    const report = await probeConnectivity(new StubHttp({ 'https://github.com': 503 }), URLS, 5000, logger);
    expect(report.reachable).toBe('https://github.com');
  });

  it('reports every host when none answers', async () => {
    expect(await probeConnectivity(new StubHttp(), URLS, 5000, logger)).toEqual({ reachable: null, failed: URLS });
  });
});

describe('resolveLatestTag', () => {
  const api = 'https://api.github.com/repos/docker/compose/releases/latest';

  it('reads tag_name', async () => {
    const http = new StubHttp({}, { [api]: { tag_name: 'v2.29.1', name: 'v2.29.1' } });
    expect(await resolveLatestTag(http, api, 5000, logger)).toBe('v2.29.1');
  });

  it('returns null for a response without a tag', async () => {
    const http = new StubHttp({}, { [api]: { message: 'API rate limit exceeded' } });
    expect(await resolveLatestTag(http, api, 5000, logger)).toBeNull();
  });

  it('returns null when the API is unreachable', async () => {
    expect(await resolveLatestTag(new StubHttp(), api, 5000, logger)).toBeNull();
  });
});
