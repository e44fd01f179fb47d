import type { ArtifactPublisher } from '../../shared/artifacts';
import type { AnalysisJob, ArtifactKind, ArtifactRef, EnrichmentRecord, IntelligenceReport, RawDocument } from '../../shared/types';
import { errorMessage, type Logger } from '../obs/logger';
import { renderMarkdownReport } from '../report/renderReport';
import { settleWith } from '../utils/async';

export interface ArtifactInput {
  job: Pick<AnalysisJob, 'id' | 'domainName'>;
  rawDocument: RawDocument;
  enrichment: EnrichmentRecord;
  intelligence: IntelligenceReport;
}

interface PendingArtifact {
  kind: ArtifactKind;
  name: string;
  contentType: string;
  body: string;
}

export const buildArtifacts = (input: ArtifactInput, generatedAt: Date): PendingArtifact[] => {
  const base = `${input.job.domainName}/${input.job.id}`;
  const bundle = {
    domain: input.job.domainName,
    rawDocument: input.rawDocument,
    enrichment: input.enrichment,
    intelligence: input.intelligence,
    generatedAt: generatedAt.toISOString(),
  };
  return [
    {
      kind: 'json',
      name: `${base}/business-intelligence.json`,
      contentType: 'application/json',
      body: JSON.stringify(bundle, null, 2),
    },
    {
      kind: 'report',
      name: `${base}/report.md`,
      contentType: 'text/markdown; charset=utf-8',
      body: renderMarkdownReport({
        domainName: input.job.domainName,
        intelligence: input.intelligence,
        newsItems: input.enrichment.newsItems,
        generatedAt,
      }),
    },
  ];
};

/**
 * Publishes the JSON bundle and the Markdown brief independently. A failed
 * publish is logged and leaves its ref out; this never rejects.
 */
export const publishArtifacts = async (
  publisher: ArtifactPublisher,
  input: ArtifactInput,
  logger: Logger,
  now: () => Date = () => new Date(),
): Promise<ArtifactRef[]> => {
  const generatedAt = now();
  const encoder = new TextEncoder();

  const results = await Promise.all(
    buildArtifacts(input, generatedAt).map((artifact) =>
      settleWith<ArtifactRef | null>(
        async () => ({
          kind: artifact.kind,
          url: await publisher.publish(encoder.encode(artifact.body), artifact.name, artifact.contentType),
          publishedAt: now().toISOString(),
        }),
        () => null,
        (error) =>
          logger.warn('Artifact publication failed', {
            jobId: input.job.id,
            kind: artifact.kind,
            publisher: publisher.name,
            error: errorMessage(error),
          }),
      ),
    ),
  );

  return results.filter((ref): ref is ArtifactRef => ref !== null);
};
