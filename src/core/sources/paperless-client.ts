/**
 * Paperless Client
 *
 * Fetches single documents from a Paperless-ngx server over its REST API.
 *
 * @module
 */

import { z } from "zod";
import { DocumentServiceError, ErrorCode } from "../errors.js";
import type { ExternalDocument, IDocumentService } from "../interfaces/index.js";
import { createLogger, formatZodError } from "../../utils/index.js";

const logger = createLogger("paperless");

export interface PaperlessClientOptions {
  /** Server base URL, e.g. `https://paperless.example` */
  url: string;
  token: string;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

const PaperlessDocumentSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  created: z.string(),
  added: z.string().nullable().optional(),
  archive_serial_number: z.number().int().nullable().optional(),
});

export class PaperlessClient implements IDocumentService {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: PaperlessClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.token = options.token;
    this.fetchFn = options.fetch ?? fetch;
  }

  documentUrl(id: number): string {
    return `${this.baseUrl}/api/documents/${id}/`;
  }

  async fetch(id: number): Promise<ExternalDocument> {
    const url = this.documentUrl(id);
    logger.debug({ id, url }, "Fetching document");

    const fetchFn = this.fetchFn;
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: {
          Authorization: `Token ${this.token}`,
          Accept: "application/json",
        },
      });
    } catch (error) {
      throw new DocumentServiceError(
        `Could not reach Paperless at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.DOCUMENT_SERVICE_FAILED,
        { documentId: id }
      );
    }

    if (response.status === 404) {
      throw new DocumentServiceError(`Document ${id} does not exist`, ErrorCode.DOCUMENT_NOT_FOUND, {
        documentId: id,
        status: response.status,
      });
    }
    if (!response.ok) {
      throw new DocumentServiceError(
        `Paperless answered ${response.status} ${response.statusText} for document ${id}`,
        ErrorCode.DOCUMENT_SERVICE_FAILED,
        { documentId: id, status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new DocumentServiceError(
        `Paperless sent a body that is not JSON for document ${id}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.DOCUMENT_SERVICE_FAILED,
        { documentId: id, status: response.status }
      );
    }

    const parsed = PaperlessDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new DocumentServiceError(
        `Unexpected document body for ${id}: ${formatZodError(parsed.error).join("; ")}`,
        ErrorCode.DOCUMENT_SERVICE_FAILED,
        { documentId: id, status: response.status }
      );
    }

    return {
      id: parsed.data.id,
      title: parsed.data.title,
      content: parsed.data.content,
      created: parsed.data.created,
      added: parsed.data.added ?? null,
      archiveSerialNumber: parsed.data.archive_serial_number ?? null,
    };
  }
}

export function createPaperlessClient(options: PaperlessClientOptions): PaperlessClient {
  return new PaperlessClient(options);
}
