/**
 * @file Domain types for container image references and their matching identifiers.
 */

import type { HashAlgorithm, HashValue, IdentifierType } from "./vex";

/**
 * Docker Hub registry host used when a reference names no registry.
 */
export const DEFAULT_IMAGE_REGISTRY = "index.docker.io" as const;

/**
 * Tag used when a reference carries neither a tag nor a digest.
 */
export const DEFAULT_IMAGE_TAG = "latest" as const;

/**
 * Represents a parsed container image reference.
 */
export type ImageReference = {
	readonly registry: string;
	/** Repository path inside the registry, e.g. `library/alpine`. */
	readonly repository: string;
	/** Empty when the reference is pinned by digest only. */
	readonly tag: string;
	/** `algorithm:hex` digest, empty when the reference is a tag. */
	readonly digest: string;
};

/**
 * Represents the operating system and architecture of a platform image.
 */
export type ImagePlatform = {
	readonly os: string;
	readonly arch: string;
};

/**
 * Identifiers and hashes that may name an image in a VEX document.
 */
export type IdentifiersBundle = {
	readonly identifiers: Readonly<Partial<Record<IdentifierType, ReadonlyArray<string>>>>;
	readonly hashes: Readonly<Partial<Record<HashAlgorithm, ReadonlyArray<HashValue>>>>;
};
