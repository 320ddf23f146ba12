/** An image attached to a post. */
export interface MediaAttachment {
  fileName: string;
  bytes: Uint8Array;
  /** Detected from the file extension when omitted. */
  mimeType?: string;
}

export interface PostData {
  content: string;
  media: MediaAttachment[];
}

export function toPostData(post: string | PostData): PostData {
  return typeof post === 'string' ? { content: post, media: [] } : post;
}

export function hasMedia(post: PostData): boolean {
  return post.media.length > 0;
}
