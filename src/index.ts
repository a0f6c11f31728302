import { Epub } from './core';

export { Epub };
export { EpubArchive } from './archive';
export { EpubElement } from './element';
export {
  EpubError,
  IoError,
  IoErrorReason,
  StructureError,
  NotFoundError,
  InvalidInputError,
  ConfigurationError
} from './errors';
export { extractContents } from './contents';
export { Item } from './item';
export { Manifest } from './manifest';
export { MetadataAccessor } from './metadata';
export { NAMESPACES, NamespacePrefix, resolveNamespace, splitQualifiedName } from './namespaces';
export { PackageDocument } from './package';
export { Spine } from './spine';
export { NavPoint, NavPointList, Toc } from './toc';
export {
  AttributeFilter,
  AuthorInput,
  AuthorList,
  CoverImage,
  EpubOptions,
  ExtractOptions,
  FileData,
  TitlePageOptions,
  defaultOptions
} from './types';

export default Epub;
