/**
 * Destination for durable artifacts. `publish` resolves to a locator callers
 * can hand out (file:// or https://) and rejects when the write fails.
 */
export interface ArtifactPublisher {
  readonly name: string;
  publish: (bytes: Uint8Array, name: string, contentType: string) => Promise<string>;
}
