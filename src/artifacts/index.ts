export * from './paths.js';
export * from './render.js';
export {
  AtomicOutputCommitter,
  getArtifactPaths,
  writeArtifacts,
  type ArtifactPaths,
} from './committer.js';
