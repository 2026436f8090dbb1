/**
 * @file Core logic generating the identifiers that can name a container image in a VEX document.
 *
 * For each image the bundle holds its SHA-256 digest and two `pkg:oci` purls,
 * one bare and one qualified with everything known about the image, so that both
 * general and specific document entries can match.
 */

import {
	parseImageReference,
	type ParseImageReferenceError,
} from "../foundation/imageReference";
import { formatPackageUrl } from "../foundation/packageUrl";
import type {
	RegistryDigestError,
	RegistryDigestPort,
} from "../ports/registryDigestPort";
import type { IdentifiersBundle, ImagePlatform } from "../types/image";
import { err, ok, type Result } from "../types/result";
import { HASH_ALGORITHM_SHA256, IDENTIFIER_TYPE_PURL } from "../types/vex";

/**
 * Literal purl type for OCI artifacts.
 */
export const PURL_TYPE_OCI = "oci" as const;

/**
 * Error variants produced while generating reference identifiers.
 */
export type GenerateReferenceIdentifiersError =
	| {
			readonly type: "reference-error";
			readonly error: ParseImageReferenceError;
	  }
	| { readonly type: "digest-error"; readonly error: RegistryDigestError };

/**
 * Inputs for building the purl variants of one image.
 */
export type ImagePurlVariantsInput = {
	/** Registry host and repository path without the image name, e.g. `cgr.dev/chainguard`. */
	readonly registryPath: string;
	readonly imageName: string;
	readonly digest: string;
	readonly tag: string;
	readonly os: string;
	readonly arch: string;
};

/**
 * Build the bare and the fully qualified `pkg:oci` purls of an image.
 */
export const generateImagePurlVariants = (
	input: ImagePurlVariantsInput,
): ReadonlyArray<string> => {
	const base = {
		type: PURL_TYPE_OCI,
		name: input.imageName,
		version: input.digest,
	};

	return [
		formatPackageUrl(base),
		formatPackageUrl({
			...base,
			qualifiers: {
				repository_url: input.registryPath,
				tag: input.tag,
				os: input.os,
				arch: input.arch,
			},
		}),
	];
};

/**
 * Generate the identifiers bundle for an image reference.
 *
 * The digest comes from the reference when pinned, otherwise from the registry.
 * When a platform is given and the registry resolves a distinct platform image,
 * its purls and digest are included after those of the index.
 */
export const generateReferenceIdentifiers = async (
	referenceString: string,
	platform: ImagePlatform | null,
	registry: RegistryDigestPort,
): Promise<Result<IdentifiersBundle, GenerateReferenceIdentifiersError>> => {
	const parsed = parseImageReference(referenceString);
	if (!parsed.ok) {
		return err({ type: "reference-error", error: parsed.error });
	}
	const reference = parsed.data;

	let digest = reference.digest;
	if (digest === "") {
		const resolved = await registry.digest(reference);
		if (!resolved.ok) {
			return err({ type: "digest-error", error: resolved.error });
		}
		digest = resolved.data;
	}

	const segments = reference.repository.split("/");
	const imageName = segments.pop() ?? reference.repository;
	const registryPath = [reference.registry, ...segments].join("/");
	const tag = reference.digest === "" ? reference.tag : "";

	const variantsFor = (imageDigest: string) =>
		generateImagePurlVariants({
			registryPath,
			imageName,
			digest: imageDigest,
			tag,
			os: platform?.os ?? "",
			arch: platform?.arch ?? "",
		});

	const purls = [...variantsFor(digest)];
	const hashes = [stripAlgorithm(digest)];

	if (platform && platform.os !== "" && platform.arch !== "") {
		const platformDigest = await registry.digest(reference, platform);
		if (!platformDigest.ok) {
			if (platformDigest.error.type !== "no-platform-match") {
				return err({ type: "digest-error", error: platformDigest.error });
			}
		} else if (platformDigest.data !== "" && platformDigest.data !== digest) {
			purls.push(...variantsFor(platformDigest.data));
			hashes.push(stripAlgorithm(platformDigest.data));
		}
	}

	return ok({
		identifiers: { [IDENTIFIER_TYPE_PURL]: purls },
		hashes: { [HASH_ALGORITHM_SHA256]: hashes },
	});
};

/**
 * Flatten a bundle into a sorted list of every identifier and hash.
 */
export const identifiersBundleToStrings = (
	bundle: IdentifiersBundle,
): ReadonlyArray<string> => {
	const values: string[] = [];
	for (const list of Object.values(bundle.identifiers)) {
		values.push(...(list ?? []));
	}
	for (const list of Object.values(bundle.hashes)) {
		values.push(...(list ?? []));
	}
	return values.sort();
};

const stripAlgorithm = (digest: string): string => {
	const colonIndex = digest.indexOf(":");
	return colonIndex >= 0 ? digest.slice(colonIndex + 1) : digest;
};
