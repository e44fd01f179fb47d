import { PutObjectCommand, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import type { ArtifactPublisher } from '../../shared/artifacts';
import type { AppConfig } from '../../shared/config';
import { ProviderUnconfiguredError } from '../../shared/errors';
import { sanitizeArtifactName } from './fsPublisher';

/** The slice of `S3Client` the publisher uses; tests hand in a fake. */
export interface ObjectStorageClient {
  send(command: PutObjectCommand): Promise<unknown>;
}

type S3Settings = AppConfig['artifacts']['s3'];

export const objectKeyFor = (settings: Pick<S3Settings, 'prefix'>, name: string): string => {
  const prefix = settings.prefix.replace(/^\/+/, '');
  return `${prefix && !prefix.endsWith('/') ? `${prefix}/` : prefix}${sanitizeArtifactName(name)}`;
};

/** Public URL when a base is configured, else the virtual-hosted S3 address (path style for custom endpoints). */
export const publicUrlFor = (settings: S3Settings, bucket: string, key: string): string => {
  const encodedKey = key.split('/').map(encodeURIComponent).join('/');
  if (settings.publicBaseUrl) {
    return `${settings.publicBaseUrl.replace(/\/+$/, '')}/${encodedKey}`;
  }
  if (settings.endpoint) {
    return `${settings.endpoint.replace(/\/+$/, '')}/${bucket}/${encodedKey}`;
  }
  return `https://${bucket}.s3.${settings.region}.amazonaws.com/${encodedKey}`;
};

export const createS3Client = (settings: S3Settings): ObjectStorageClient => {
  const clientConfig: S3ClientConfig = { region: settings.region };
  if (settings.endpoint) {
    clientConfig.endpoint = settings.endpoint;
    clientConfig.forcePathStyle = true;
  }
  const s3 = new S3Client(clientConfig);
  return { send: (command) => s3.send(command) };
};

/**
 * S3-compatible publisher. Credentials come from the SDK's default provider
 * chain (environment, shared config, instance role).
 */
export const createS3ArtifactPublisher = (
  config: Pick<AppConfig, 'artifacts'>,
  client: ObjectStorageClient = createS3Client(config.artifacts.s3),
): ArtifactPublisher => {
  const settings = config.artifacts.s3;
  const bucket = settings.bucket;
  if (!bucket) {
    throw new ProviderUnconfiguredError('S3', 'S3_BUCKET is not set');
  }

  return {
    name: 's3',
    publish: async (bytes, name, contentType) => {
      const key = objectKeyFor(settings, name);
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: bytes,
          ContentType: contentType,
        }),
      );
      return publicUrlFor(settings, bucket, key);
    },
  };
};
