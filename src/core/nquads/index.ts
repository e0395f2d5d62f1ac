/**
 * N-Quads Module
 *
 * Term encoding and line-oriented output.
 *
 * @module
 */

export {
  NAMESPACES,
  SSM_PREFIX,
  encodeUri,
  ssm,
  ssmTriplet,
  encodeBoolean,
  decodeBoolean,
  encodeInteger,
  encodeString,
  encodeStringTriplet,
  escapeLiteral,
  type NamespaceTag,
} from "./codec.js";

export {
  RDF_TYPE,
  RDFS,
  OWL,
  DOMAIN_PREFIX,
  core,
  domainFragment,
  packageResource,
  featureResource,
} from "./vocabulary.js";

export { NQuadsWriter, FileSink, MemorySink, type QuadSink } from "./writer.js";
