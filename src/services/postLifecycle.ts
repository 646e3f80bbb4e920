import { PostTransitionError } from '../errors.js';
import type { PostStatus } from '../types.js';

/** Legal next states per post state. `published` is terminal. */
export const POST_TRANSITIONS: Readonly<Record<PostStatus, readonly PostStatus[]>> = Object.freeze({
  draft: ['generating'],
  generating: ['in_review', 'approved', 'failed'],
  in_review: ['approved', 'rejected', 'generating'],
  approved: ['published', 'in_review', 'rejected'],
  published: [],
  rejected: ['generating'],
  failed: ['generating']
});

/** States a post may be created in */
export const INITIAL_POST_STATUSES: readonly PostStatus[] = ['draft', 'generating'];

export function canTransition(from: PostStatus, to: PostStatus): boolean {
  return POST_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: PostStatus, to: PostStatus): void {
  if (!canTransition(from, to)) throw new PostTransitionError(from, to);
}

/** Final state of a generation run. */
export function finalStatus(passed: boolean, autoPublish: boolean): PostStatus {
  return passed && autoPublish ? 'approved' : 'in_review';
}
