/**
 * @file Port definition for reading VEX document sources.
 */

import { err, ok, type Result } from "../types/result";

/**
 * Represents failures that may occur while reading a document.
 */
export type DocumentReadError =
	| { readonly type: "document-not-found"; readonly source: string }
	| {
			readonly type: "document-read-error";
			readonly source: string;
			readonly message: string;
	  };

/**
 * Represents the capability of loading the raw text of a document.
 */
export type DocumentReader = (
	source: string,
) => Promise<Result<string, DocumentReadError>>;

/**
 * Creates a stub reader answering from an in-memory table of sources.
 */
export const createStubDocumentReader =
	(documents: Readonly<Record<string, string>>): DocumentReader =>
	async (source) => {
		const text = documents[source];
		if (text === undefined) {
			return err({ type: "document-not-found", source });
		}
		return ok(text);
	};
