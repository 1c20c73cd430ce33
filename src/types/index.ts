export {
  ROOT_MODULE,
  compareModulePaths,
  displayModulePath,
  isWithinModule,
  joinModulePath,
  moduleCallName,
  modulePathSegments,
  parentModulePath,
  type ModulePath,
} from './module-path';

export {
  UNKNOWN_COUNT_KEY,
  baseIdentity,
  instanceIdentity,
  matchesIdentityPattern,
  parseBaseIdentity,
  resourceAddress,
  type InstanceKey,
  type ParsedIdentity,
} from './identity';
