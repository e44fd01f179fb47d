import { describe, expect, it } from 'vitest';
import type { ArtifactPublisher } from '../../../shared/artifacts';
import { createNoopLogger } from '../../obs/logger';
import { enrichmentRecord, intelligenceReport, rawDocument } from '../../testing/fixtures';
import { buildArtifacts, publishArtifacts, type ArtifactInput } from '../publishArtifacts';

const NOW = new Date('2026-10-19T12:00:00.000Z');

const input: ArtifactInput = {
  job: { id: 'job-1', domainName: 'acme.test' },
  rawDocument: rawDocument(),
  enrichment: enrichmentRecord(),
  intelligence: intelligenceReport(),
};

describe('buildArtifacts', () => {
  it('names the bundle and the brief under the domain and job', () => {
    const artifacts = buildArtifacts(input, NOW);

    expect(artifacts.map((artifact) => [artifact.kind, artifact.name, artifact.contentType])).toEqual([
      ['json', 'acme.test/job-1/business-intelligence.json', 'application/json'],
      ['report', 'acme.test/job-1/report.md', 'text/markdown; charset=utf-8'],
    ]);
  });

  it('bundles every input with the generation time', () => {
    const [bundle] = buildArtifacts(input, NOW);

    expect(JSON.parse(bundle?.body ?? '{}')).toEqual({
      domain: 'acme.test',
      rawDocument: input.rawDocument,
      enrichment: input.enrichment,
      intelligence: input.intelligence,
      generatedAt: '2026-10-19T12:00:00.000Z',
    });
  });
});

describe('publishArtifacts', () => {
  it('returns a ref per published artifact', async () => {
    const bodies = new Map<string, string>();
    const publisher: ArtifactPublisher = {
      name: 'memory',
      publish: async (bytes, name) => {
        bodies.set(name, new TextDecoder().decode(bytes));
        return `memory://${name}`;
      },
    };

    const refs = await publishArtifacts(publisher, input, createNoopLogger(), () => NOW);

    expect(refs).toEqual([
      { kind: 'json', url: 'memory://acme.test/job-1/business-intelligence.json', publishedAt: '2026-10-19T12:00:00.000Z' },
      { kind: 'report', url: 'memory://acme.test/job-1/report.md', publishedAt: '2026-10-19T12:00:00.000Z' },
    ]);
    expect(bodies.get('acme.test/job-1/report.md')?.startsWith('# Business Intelligence Report\n')).toBe(true);
  });

  it('drops only the artifact that failed', async () => {
    const publisher: ArtifactPublisher = {
      name: 'flaky',
      publish: async (_bytes, name) => {
        if (name.endsWith('.json')) throw new Error('bucket unavailable');
        return `memory://${name}`;
      },
    };

    const refs = await publishArtifacts(publisher, input, createNoopLogger(), () => NOW);

    expect(refs.map((ref) => ref.kind)).toEqual(['report']);
  });

  it('resolves to nothing when every publish fails', async () => {
    const publisher: ArtifactPublisher = {
      name: 'broken',
      publish: async () => {
        throw new Error('disk full');
      },
    };

    await expect(publishArtifacts(publisher, input, createNoopLogger())).resolves.toEqual([]);
  });
});
