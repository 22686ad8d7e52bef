export type { ExtensionFilter } from './extension_filter';
export {
  EXTENSION_SEPARATOR,
  createExtensionFilter,
  matchesExtension,
  normalizeExtensions,
} from './extension_filter';
