/**
 * @file Parser for container image reference strings.
 */

import {
	DEFAULT_IMAGE_REGISTRY,
	DEFAULT_IMAGE_TAG,
	type ImageReference,
} from "../types/image";
import { err, ok, type Result } from "../types/result";

/**
 * Error variants produced while parsing an image reference.
 */
export type ParseImageReferenceError =
	| { readonly type: "empty-reference" }
	| {
			readonly type: "invalid-reference";
			readonly reference: string;
			readonly reason: string;
	  };

const REPOSITORY_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;
const TAG_PATTERN = /^[\w][\w.-]{0,127}$/;
const DIGEST_PATTERN = /^[a-z0-9]+(?:[.+_-][a-z0-9]+)*:[a-f0-9]{32,}$/;
const LEGACY_DOCKER_HOSTS = new Set(["docker.io", "registry-1.docker.io"]);

/**
 * Parse an image reference such as `alpine`, `alpine:3.18`,
 * `cgr.dev/chainguard/curl@sha256:...` into its parts.
 *
 * A reference without registry resolves to Docker Hub, where single segment
 * repositories live under `library/`. A reference without tag or digest gets
 * the `latest` tag.
 */
export const parseImageReference = (
	reference: string,
): Result<ImageReference, ParseImageReferenceError> => {
	const trimmed = reference.trim();
	if (trimmed.length === 0) {
		return err({ type: "empty-reference" });
	}

	const invalid = (reason: string) =>
		err<ImageReference, ParseImageReferenceError>({
			type: "invalid-reference",
			reference,
			reason,
		});

	let name = trimmed;
	let digest = "";
	const atIndex = name.indexOf("@");
	if (atIndex >= 0) {
		digest = name.slice(atIndex + 1);
		name = name.slice(0, atIndex);
		if (!DIGEST_PATTERN.test(digest)) {
			return invalid(`malformed digest '${digest}'`);
		}
	}

	let tag = "";
	const colonIndex = name.lastIndexOf(":");
	if (colonIndex > name.lastIndexOf("/")) {
		tag = name.slice(colonIndex + 1);
		name = name.slice(0, colonIndex);
		if (!TAG_PATTERN.test(tag)) {
			return invalid(`malformed tag '${tag}'`);
		}
	}

	const segments = name.split("/");
	let registry: string = DEFAULT_IMAGE_REGISTRY;
	const first = segments[0] ?? "";
	if (
		segments.length > 1 &&
		(first.includes(".") || first.includes(":") || first === "localhost")
	) {
		registry = LEGACY_DOCKER_HOSTS.has(first) ? DEFAULT_IMAGE_REGISTRY : first;
		segments.shift();
	}

	if (segments.length === 0) {
		return invalid("missing repository");
	}
	for (const segment of segments) {
		if (!REPOSITORY_COMPONENT_PATTERN.test(segment)) {
			return invalid(`malformed repository component '${segment}'`);
		}
	}

	if (registry === DEFAULT_IMAGE_REGISTRY && segments.length === 1) {
		segments.unshift("library");
	}

	return ok({
		registry,
		repository: segments.join("/"),
		tag: tag === "" && digest === "" ? DEFAULT_IMAGE_TAG : tag,
		digest,
	});
};

/**
 * Build the string form of a parsed reference, digest preferred over tag.
 */
export const formatImageReference = (reference: ImageReference): string => {
	const base = `${reference.registry}/${reference.repository}`;
	if (reference.digest !== "") return `${base}@${reference.digest}`;
	return `${base}:${reference.tag}`;
};
