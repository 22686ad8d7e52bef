export type { OutputFormat, RenderOptions } from './output_formatter';
export {
  NO_FILES_MESSAGE,
  NO_MATCHING_FILES_MESSAGE,
  emptyResultMessage,
  formatJson,
  formatPlain,
  renderListing,
} from './output_formatter';
