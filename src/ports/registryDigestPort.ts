/**
 * @file Port definition for looking up image digests in a container registry.
 */

import { formatImageReference } from "../foundation/imageReference";
import type { ImagePlatform, ImageReference } from "../types/image";
import { err, type Result } from "../types/result";

/**
 * Represents failures that may occur while resolving a digest.
 */
export type RegistryDigestError =
	| { readonly type: "no-platform-match"; readonly platform: ImagePlatform }
	| { readonly type: "not-found"; readonly reference: string }
	| { readonly type: "registry-error"; readonly message: string };

/**
 * Represents the capability of resolving an image reference (optionally for a
 * single platform of a multi-arch index) into its `algorithm:hex` digest.
 */
export type RegistryDigestPort = {
	readonly digest: (
		reference: ImageReference,
		platform?: ImagePlatform,
	) => Promise<Result<string, RegistryDigestError>>;
};

/**
 * Creates a stub port answering from the supplied table, keyed by
 * `registry/repository:tag` or `registry/repository@digest`, with an optional
 * `|os/arch` suffix for platform lookups.
 */
export const createStubRegistryDigestPort = (
	digests: Readonly<Record<string, Result<string, RegistryDigestError>>>,
): RegistryDigestPort => ({
	digest: async (reference, platform) => {
		const base = formatImageReference(reference);
		const key = platform ? `${base}|${platform.os}/${platform.arch}` : base;
		return digests[key] ?? err({ type: "not-found", reference: key });
	},
});
