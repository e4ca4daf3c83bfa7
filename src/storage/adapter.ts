import type {
  MicroformatsEntry,
  PostMetadata,
  UpdateOperation,
} from "../types/micropub.js";

/**
 * URL-keyed view of the entry store used by the Micropub endpoint
 */
export interface EntryStorageAdapter {
  /**
   * Create a new post
   * @returns Metadata with the absolute URL of the post, or a null URL for drafts
   */
  createPost(entry: MicroformatsEntry): Promise<PostMetadata>;

  /**
   * Retrieve a live post by URL
   * @param properties - Only return these properties
   * @returns Microformats2 entry or null if not found
   */
  getPost(
    url: string,
    properties?: string[]
  ): Promise<MicroformatsEntry | null>;

  /**
   * Apply update operations to a post
   * @throws NotFoundError when no live post has this URL
   */
  updatePost(url: string, operations: UpdateOperation[]): Promise<PostMetadata>;

  /**
   * Delete a post (soft delete)
   */
  deletePost(url: string): Promise<void>;

  /**
   * Restore a deleted post
   * @throws ConflictError when another post took its URL in the meantime
   */
  undeletePost(url: string): Promise<void>;
}
