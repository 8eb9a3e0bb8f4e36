export {
  findProjectRoot,
  openStore,
  optionalSessionEmail,
  resolveDataDir,
  resolveSessionEmail,
  withStore,
} from './store-helper.js';
export { SharedFlags } from './flags.js';
export { logVerbose, logWarning } from './log.js';
export {
  authorName,
  formatAuthor,
  formatComment,
  formatPostSummary,
  formatTags,
  logPost,
  outputJsonOrPlain,
  tableSeparator,
  truncate,
} from './output.js';
