/**
 * MIME Module
 *
 * Provides MIME message handling including:
 * - Header parsing with RFC 2047 encoded word support
 * - Multipart boundary detection and part extraction
 * - RFC 5322 dates
 * - Outbound entity construction and serialization
 *
 * @packageDocumentation
 */

// Header parsing
export {
  parseHeaderFields,
  getHeader,
  toHeaderMap,
  decodeEncodedWords,
  decodeWithCharset,
  unfoldHeaders,
  extractHeaderParam,
  parseParameterizedValue,
  parseContentType,
} from './header-parser.js';

export type { ContentType, ParameterizedValue } from './header-parser.js';

// Multipart parsing
export {
  extractBoundary,
  splitMultipartBody,
  parseMimePart,
  parseMimeMessage,
  walkMimeTree,
  partText,
  partFilename,
  decodeContent,
} from './multipart-parser.js';

export type { MimePart } from './multipart-parser.js';

// Dates
export { parseRfc5322Date, formatRfc5322Date, formatShortDate } from './date.js';

// Outbound
export { MimeEntity, encodeHeaderValue } from './mime-entity.js';
