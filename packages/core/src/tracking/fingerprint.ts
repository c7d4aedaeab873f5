import stableStringify from "fast-json-stable-stringify";
import type { FilteredRow } from "../source/types";

/** Hex digest identifying a filtered row set. */
export type ContentFingerprint = string;

/** Fingerprint of a filtered set with no rows. Distinct from any SHA-256 digest. */
export const EMPTY_FINGERPRINT: ContentFingerprint = "empty";

/**
 * Deterministic SHA-256 over the cell values of `rows`, row-major then column-major.
 *
 * Only values participate: provenance and header names do not. Row order matters.
 */
export async function computeFingerprint(rows: readonly FilteredRow[]): Promise<ContentFingerprint> {
	if (rows.length === 0) return EMPTY_FINGERPRINT;

	const payload = stableStringify(rows.map((row) => row.values));
	const data = new TextEncoder().encode(payload);
	const hashBuffer = await crypto.subtle.digest("SHA-256", data);
	const bytes = new Uint8Array(hashBuffer);

	let hex = "";
	for (const b of bytes) {
		hex += b.toString(16).padStart(2, "0");
	}
	return hex;
}
