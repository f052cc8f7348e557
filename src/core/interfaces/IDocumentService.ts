/**
 * IDocumentService - Read access to the external document service
 *
 * @module
 */

/**
 * A document as fetched from the service. Dates are the service's own
 * ISO 8601 strings.
 */
export interface ExternalDocument {
  id: number;
  title: string;
  content: string;
  created: string;
  added: string | null;
  archiveSerialNumber: number | null;
}

export interface IDocumentService {
  /**
   * Fetches one document.
   *
   * @throws DocumentServiceError when the document is missing or the service is unreachable
   */
  fetch(id: number): Promise<ExternalDocument>;
}
