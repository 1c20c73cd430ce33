/**
 * Resource Metadata
 * @module metadata
 */

export {
  BodyEvaluator,
  MetadataExtractor,
  StaticResource,
  extractMetadata,
  type ConditionDescriptor,
  type ExtractedResource,
  type ExtractorOptions,
  type ResourceMetadata,
  type SourceReference,
} from './metadata-extractor';

export {
  AnnotationOverlaySchema,
  applyAnnotations,
  loadAnnotations,
  parseAnnotations,
  type AnnotationInput,
  type AnnotationOverlay,
  type EdgeOverlay,
} from './annotations';
