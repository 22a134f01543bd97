/**
 * Split an image reference into repository and tag.
 *
 * A colon only starts a tag when it comes after the last slash, so
 * `registry:5000/app` has no tag. Digest references (`app@sha256:...`) keep
 * the digest in the repository part and carry no tag.
 */
export interface ImageRef {
  readonly repository: string
  readonly tag?: string
}

export function parseImageRef(reference: string): ImageRef {
  if (reference.includes('@')) {
    return { repository: reference }
  }

  const colon = reference.lastIndexOf(':')
  if (colon === -1 || colon < reference.lastIndexOf('/')) {
    return { repository: reference }
  }
  return { repository: reference.slice(0, colon), tag: reference.slice(colon + 1) }
}
