export {
  BlogService,
  SYSTEM_EMAIL,
  SYSTEM_NAME,
  WELCOME_BODY,
  WELCOME_TAG,
  WELCOME_TITLE,
} from './blog-service.js';
export type {
  AuthoredComment,
  BlogRepositories,
  BlogServiceOptions,
  Commenter,
  LoginResult,
  PostChanges,
  PostDraft,
  PostFilter,
  TagCount,
} from './blog-service.js';
export { EMAIL_PATTERN, parseTags, requireText, validateEmail } from './validation.js';
export type { TagsInput } from './validation.js';
export { formatTimestamp } from './timestamp.js';
