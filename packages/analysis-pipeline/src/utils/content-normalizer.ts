import { ConfigurationError } from '../errors';

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

/**
 * Raw content handed to the pipeline by the content source
 */
export type RawContent = string | Uint8Array;

export type ContentKind = 'text' | 'pdf';

export type NormalizedContent =
  | { kind: 'text'; text: string }
  | { kind: 'pdf'; data: Uint8Array };

/**
 * ContentNormalizer - canonical form of incoming content
 *
 * Text is normalized so that inputs differing only in encoding details
 * (Unicode composition, line endings, stray control characters) share one
 * fingerprint.
 * - NFC normalization
 * - CRLF and lone CR become LF
 * - Control characters other than tab and LF are removed
 */
export class ContentNormalizer {
  static normalizeText(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(/\r\n?/g, '\n')
      .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '');
  }

  static isPdf(bytes: Uint8Array): boolean {
    return (
      bytes.length >= PDF_MAGIC.length &&
      PDF_MAGIC.every((byte, i) => bytes[i] === byte)
    );
  }

  /**
   * Normalize content of an optionally declared kind. Bytes without a
   * declared kind are PDF when they start with `%PDF-`, UTF-8 text otherwise.
   *
   * @throws ConfigurationError when the declared kind contradicts the content
   */
  static normalize(content: RawContent, kind?: ContentKind): NormalizedContent {
    if (typeof content === 'string') {
      if (kind === 'pdf') {
        throw new ConfigurationError(
          'PDF content must be provided as bytes, not as text',
        );
      }
      return { kind: 'text', text: this.normalizeText(content) };
    }

    const isPdf = this.isPdf(content);
    if (kind === 'pdf' && !isPdf) {
      throw new ConfigurationError(
        'Content declared as PDF does not start with a %PDF- header',
      );
    }
    if (kind === 'text' && isPdf) {
      throw new ConfigurationError(
        'PDF content cannot be analyzed as text; declare it as pdf',
      );
    }
    if (isPdf) {
      return { kind: 'pdf', data: content };
    }

    return {
      kind: 'text',
      text: this.normalizeText(new TextDecoder('utf-8').decode(content)),
    };
  }
}
