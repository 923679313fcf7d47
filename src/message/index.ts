export { MailMessage } from './message.js';
export type { MailMessageOptions } from './message.js';
export { Attachment } from './attachment.js';
export { parseRawMessage } from './raw-parser.js';
