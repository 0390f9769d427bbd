import { MissingTagError } from "./errors";
import { ImageReference } from "./types";

/**
 * Splits `repository:tag` at the first colon. A registry host with a port
 * must be stripped before calling this, or the port ends up in the tag.
 */
export function parseImageReference(image: string): ImageReference {
	const separator = image.indexOf(":");
	if (separator == -1) throw new MissingTagError(image);
	return {
		repository: image.slice(0, separator),
		tag: image.slice(separator + 1),
	};
}

/** Removes `<registryName>/` from the start of the image, and nothing else. */
export function stripRegistryHost(image: string, registryName: string): string {
	if (!registryName) return image;
	const host = registryName.replace(/^https?:\/\//, "").replace(/\/+$/, "");
	const prefix = `${host}/`;
	return image.startsWith(prefix) ? image.slice(prefix.length) : image;
}

/** Docker Hub serves official images under `library/`. */
export function withDefaultNamespace(repository: string): string {
	return repository.includes("/") ? repository : "library/" + repository;
}
