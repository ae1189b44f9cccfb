/**
 * Container image reference parsing
 *
 * @example
 * parseImageReference('postgres:16.2')
 * // { registry: 'dockerhub', repository: 'library/postgres', tag: '16.2' }
 * parseImageReference('ghcr.io/acme/api:v1.4.0')
 * // { registry: 'ghcr.io', repository: 'acme/api', tag: 'v1.4.0' }
 */

export const DOCKERHUB_REGISTRY = 'dockerhub';

export interface ImageReference {
  /** `dockerhub` or the registry host (with port, when present) */
  registry: string;
  repository: string;
  /** Explicit tag, when the reference carries one */
  tag?: string;
}

/**
 * Split an image string into its name and tag.
 *
 * A `:` only separates the tag when it follows the last `/`, so a
 * registry port is never mistaken for a tag.
 */
export function splitImageTag(image: string): { name: string; tag?: string } {
  const colon = image.lastIndexOf(':');
  if (colon === -1 || colon < image.lastIndexOf('/')) {
    return { name: image };
  }
  return { name: image.slice(0, colon), tag: image.slice(colon + 1) };
}

/**
 * Whether the first path segment of a name is a registry host.
 */
function isRegistryHost(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

export function parseImageReference(image: string): ImageReference {
  const { name, tag } = splitImageTag(image);
  const parts = name.split('/');

  let registry: string;
  let repository: string;
  if (parts.length > 1 && isRegistryHost(parts[0])) {
    registry = parts[0];
    repository = parts.slice(1).join('/');
  } else {
    registry = DOCKERHUB_REGISTRY;
    repository = parts.length === 1 ? `library/${name}` : name;
  }

  return tag === undefined ? { registry, repository } : { registry, repository, tag };
}

/**
 * Whether discovery can track the image: it needs an explicit tag and
 * must not be pinned by digest or templated.
 */
export function isTrackableImage(image: string): boolean {
  if (image.includes('@') || image.includes('$') || image.includes('{')) {
    return false;
  }
  const { tag } = splitImageTag(image);
  return tag !== undefined && tag.length > 0;
}

/**
 * Short identifier of a repository: its last path segment.
 */
export function imageId(repository: string): string {
  const segments = repository.split('/');
  return segments[segments.length - 1];
}
