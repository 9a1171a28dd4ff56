/**
 * Artifact domain model.
 *
 * An artifact is the single logical file a pipeline run carries from stage
 * to stage, together with the ledger of external side effects the run has
 * committed on its behalf.
 */

import { v4 as uuid } from 'uuid';

/** Values a committed effect records about the resource it touched. */
export type EffectResource = Record<string, string | number | boolean>;

/** What a stage reports after it changed something outside the process. */
export interface EffectDescriptor {
  /** Effect kind, e.g. "object.uploaded", "file.written", "cdn.purged". */
  kind: string;
  description: string;
  resource: EffectResource;
}

/** A durable external side effect tracked for possible rollback. */
export interface CommittedEffect extends EffectDescriptor {
  id: string;
  /** Name of the stage that committed the effect. */
  stage: string;
  committedAt: string;
}

/** The file moving through the pipeline. */
export interface Artifact {
  id: string;
  /** Local path the artifact was read from. */
  sourcePath: string;
  /** Object key the artifact is (or will be) stored under. */
  key: string;
  /** Loaded bytes; null until a stage reads the source. */
  content: Buffer | null;
  contentType?: string;
  /** Last stage that committed on this artifact; null before the first. */
  stage: string | null;
  /** Append-only until rollback starts. */
  effects: CommittedEffect[];
  /** Stage outputs such as storage URL, CDN URL and optimization stats. */
  attributes: Record<string, string>;
}

export interface CreateArtifactInput {
  sourcePath: string;
  /** Defaults to the source path with forward slashes and no leading slash. */
  key?: string;
  content?: Buffer;
  contentType?: string;
  attributes?: Record<string, string>;
}

/** Normalize a path into an object key. */
export function toObjectKey(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\.?\/+/, '');
}

/** Create a fresh artifact at pipeline start. */
export function createArtifact(input: CreateArtifactInput): Artifact {
  return {
    id: `art_${uuid()}`,
    sourcePath: input.sourcePath,
    key: input.key ?? toObjectKey(input.sourcePath),
    content: input.content ?? null,
    contentType: input.contentType,
    stage: null,
    effects: [],
    attributes: { ...input.attributes },
  };
}

/**
 * Snapshot of an artifact for results and stores: the bytes are replaced by
 * their length so results stay small and serializable.
 */
export interface ArtifactSnapshot {
  id: string;
  sourcePath: string;
  key: string;
  contentType?: string;
  sizeBytes: number | null;
  stage: string | null;
  attributes: Record<string, string>;
}

export function snapshotArtifact(artifact: Artifact): ArtifactSnapshot {
  return {
    id: artifact.id,
    sourcePath: artifact.sourcePath,
    key: artifact.key,
    contentType: artifact.contentType,
    sizeBytes: artifact.content ? artifact.content.length : null,
    stage: artifact.stage,
    attributes: { ...artifact.attributes },
  };
}
