/**
 * Services Module
 */

export {
  CodePageService,
  convertData,
  detectCodePage,
  detectEncoding,
  type CodePageServiceOptions,
} from './code-page-service.js';
