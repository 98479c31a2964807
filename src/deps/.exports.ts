/**
 * sbt dependency upgrade engine.
 *
 * This module provides tools for extracting dependency coordinates from
 * sbt build definitions, resolving published versions, classifying
 * upgrades and rewriting the build text in place.
 *
 * @module
 */

export {
  artifactNames,
  type Coordinate,
  coordinateKey,
  type CoordinateTarget,
  createCoordinate,
  type CrossSeparator,
  formatCoordinate,
  scalaSuffixes,
  type Span,
} from './Coordinate.ts';
export { ParseError, ScalaLexer, type Token } from './ScalaLexer.ts';
export {
  BuildFileParser,
  type Declaration,
  patternToRegex,
  type VersionVariable,
} from './BuildFileParser.ts';
export {
  type ParsedVersion,
  type UpdateRank,
  VersionComparator,
} from './VersionComparator.ts';
export {
  type ClassifyOptions,
  retargetCandidate,
  type UpdateAlternative,
  type UpdateCandidate,
  UpdateClassifier,
} from './UpdateClassifier.ts';
export {
  type RegistryClient,
  RegistryError,
  type RegistryErrorKind,
  ResolutionCancelledError,
  type VersionSet,
} from './RegistryClient.ts';
export {
  DEFAULT_REGISTRY_URL,
  MavenCentralClient,
  type MavenCentralClientOptions,
} from './MavenCentralClient.ts';
export {
  RegistryResolver,
  type RegistryResolverOptions,
  type ResolutionOutcome,
  type ResolutionReport,
} from './RegistryResolver.ts';
export {
  BuildFileRewriter,
  type Edit,
  type EditPlan,
  RewriteError,
  type RewriteErrorKind,
} from './BuildFileRewriter.ts';
