import { GitHubIssueEnricher, passthroughEnricher } from './issue-enricher';
import { createSilentLogger } from '../observability';
import { createIssueEvent } from '../types';

const event = createIssueEvent({
  repository: 'prometheus/prometheus',
  issueNumber: 123,
  title: 'Crash on startup',
  url: 'https://github.com/prometheus/prometheus/issues/123',
  author: 'alice',
  labels: ['bug'],
  receivedAt: new Date('2024-05-01T12:00:00Z'),
});

function stubFetch(respond: () => Response) {
  const requests: Array<{ url: string; init?: RequestInit }> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), init });
    return respond();
  };
  return { fetchImpl, requests };
}

describe('passthroughEnricher', () => {
  it('should return the same event', async () => {
    expect(await passthroughEnricher.enrich(event)).toBe(event);
  });
});

describe('GitHubIssueEnricher', () => {
  it('should replace labels with the current ones from the API', async () => {
    const { fetchImpl, requests } = stubFetch(
      () => new Response(JSON.stringify({ labels: [{ name: 'bug' }, { name: 'needs-triage' }] }), { status: 200 })
    );
    const enricher = new GitHubIssueEnricher('test-github-token', createSilentLogger(), {
      apiBase: 'http://github.test',
      fetchImpl,
    });

    const enriched = await enricher.enrich(event);

    expect(enriched.labels).toEqual(['bug', 'needs-triage']);
    expect(enriched.title).toBe('Crash on startup');
    expect(enriched.receivedAt).toEqual(event.receivedAt);
    expect(Object.isFrozen(enriched)).toBe(true);

    expect(requests[0].url).toBe('http://github.test/repos/prometheus/prometheus/issues/123');
    const headers = new Headers(requests[0].init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-github-token');
    expect(headers.get('accept')).toBe('application/vnd.github+json');
  });

  it('should keep the webhook labels when the API answers with an error', async () => {
    const { fetchImpl } = stubFetch(() => new Response('Not Found', { status: 404 }));
    const enricher = new GitHubIssueEnricher('test-github-token', createSilentLogger(), { fetchImpl });

    expect(await enricher.enrich(event)).toBe(event);
  });

  it('should keep the webhook labels when the request fails', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const enricher = new GitHubIssueEnricher('test-github-token', createSilentLogger(), { fetchImpl });

    expect(await enricher.enrich(event)).toBe(event);
  });

  it('should ignore responses without a labels array', async () => {
    const { fetchImpl } = stubFetch(() => new Response(JSON.stringify({ message: 'odd' }), { status: 200 }));
    const enricher = new GitHubIssueEnricher('test-github-token', createSilentLogger(), { fetchImpl });

    expect(await enricher.enrich(event)).toBe(event);
  });
});
