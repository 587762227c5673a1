/**
 * Descriptive metadata of the document being analyzed, supplied by the
 * content source. Only `documentId` is required.
 */
export interface DocumentMetadata {
  /**
   * Stable identifier of the document in the caller's system
   */
  documentId: string;

  /**
   * Official identifier such as a bill number (e.g. 'HB 1234')
   */
  identifier?: string;

  title?: string;
  description?: string;

  /**
   * Government level or body, e.g. 'state', 'federal'
   */
  jurisdiction?: string;

  /**
   * Where the text came from, e.g. 'legiscan'
   */
  source?: string;

  /**
   * Legislative status, e.g. 'introduced', 'passed'
   */
  status?: string;
}
