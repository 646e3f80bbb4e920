import type { PostStatus } from './types.js';

export type ContentEngineErrorCode =
  | 'CLIENT_NOT_FOUND'
  | 'KEYWORD_NOT_FOUND'
  | 'DRAFT_GENERATION_FAILED'
  | 'STRATEGY_GENERATION_FAILED'
  | 'INVALID_POST_TRANSITION'
  | 'PERSISTENCE_FAILED';

export class ContentEngineError extends Error {
  constructor(
    readonly code: ContentEngineErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ContentEngineError';
  }
}

export class ClientNotFoundError extends ContentEngineError {
  constructor(readonly clientId: string) {
    super('CLIENT_NOT_FOUND', `Client ${clientId} not found or inactive`);
    this.name = 'ClientNotFoundError';
  }
}

export class KeywordNotFoundError extends ContentEngineError {
  constructor(
    readonly keywordId: string,
    readonly clientId: string
  ) {
    super('KEYWORD_NOT_FOUND', `Keyword ${keywordId} not found for client ${clientId}`);
    this.name = 'KeywordNotFoundError';
  }
}

/** The drafting provider (and its fallback) failed; the post is left in `failed`. */
export class DraftGenerationError extends ContentEngineError {
  constructor(
    readonly postId: string,
    readonly providerError: string
  ) {
    super('DRAFT_GENERATION_FAILED', `Draft generation failed for post ${postId}: ${providerError}`);
    this.name = 'DraftGenerationError';
  }
}

export class StrategyGenerationError extends ContentEngineError {
  constructor(message: string) {
    super('STRATEGY_GENERATION_FAILED', `Keyword research failed: ${message}`);
    this.name = 'StrategyGenerationError';
  }
}

export class PostTransitionError extends ContentEngineError {
  constructor(
    readonly from: PostStatus,
    readonly to: PostStatus
  ) {
    super('INVALID_POST_TRANSITION', `Illegal post transition ${from} → ${to}`);
    this.name = 'PostTransitionError';
  }
}

export class PersistenceError extends ContentEngineError {
  constructor(message: string) {
    super('PERSISTENCE_FAILED', message);
    this.name = 'PersistenceError';
  }
}
