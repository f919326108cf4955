/**
 * Raw execution results.
 *
 * @module types/responses
 */

/**
 * Transport-level metadata describing a received response.
 */
export interface ResponseMetadata {
  /** Final URL the response came from. */
  url: string;
  /** HTTP status code. */
  statusCode: number;
  /** Response headers, names lowercased. */
  headers: Record<string, string>;
}

/**
 * Raw body bytes together with the response metadata.
 */
export interface DataResponse {
  data: Uint8Array;
  urlResponse: ResponseMetadata;
}

/**
 * Location of a downloaded body together with the response metadata.
 */
export interface DownloadResponse {
  location: string;
  urlResponse: ResponseMetadata;
}

/** Uploads answer with a body like any other request. */
export type UploadResponse = DataResponse;
