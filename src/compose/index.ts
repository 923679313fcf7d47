export { composeMessage, toMimeAttachment, makeMessageId } from './composer.js';
export { guessMediaType, DEFAULT_MEDIA_TYPE } from './media-types.js';
