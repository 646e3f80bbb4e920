import type { AuditReport } from '../seo/auditor.js';
import type {
  Client,
  ExistingPostRef,
  KeywordStatus,
  MoneyPage,
  PostStatus,
  SeoKeyword
} from '../types.js';

export interface NewPost {
  clientId: string;
  clusterId: string | null;
  title: string;
  slug: string;
  primaryKeyword: string;
  secondaryKeywords: string[];
  status: PostStatus;
}

/** Columns the pipeline writes back. Only the listed fields change. */
export interface PostPatch {
  title?: string;
  slug?: string;
  metaDescription?: string;
  excerpt?: string;
  contentHtml?: string;
  seoScore?: number;
  generationProvider?: string;
  generationModel?: string;
  revisionProvider?: string;
  revisionModel?: string;
  aiCostUsd?: number;
  aiTokensTotal?: number;
}

/** Moves a post from `from` to `to`; rejected unless the post is still in `from`. */
export interface StatusChange {
  from: PostStatus;
  to: PostStatus;
}

export interface AuditLogEntry {
  postId: string;
  clientId: string;
  primaryKeyword: string;
  report: AuditReport;
  autoRevised: boolean;
}

export interface KeywordPatch {
  status?: KeywordStatus;
  postId?: string | null;
}

/** Persistence the generation pipeline reads and writes. */
export interface ContentStore {
  getClient(clientId: string): Promise<Client | null>;
  getKeyword(clientId: string, keywordId: string): Promise<SeoKeyword | null>;
  /** Active pages, priority descending */
  getActiveMoneyPages(clientId: string): Promise<MoneyPage[]>;
  /** Published posts, most recent first, without `excludePostId` */
  getRecentPublishedPosts(clientId: string, excludePostId: string | null, limit?: number): Promise<ExistingPostRef[]>;
  createPost(post: NewPost): Promise<string>;
  /** Applies `patch` and, when given, `status` in one write. Throws PostTransitionError / PersistenceError. */
  updatePost(postId: string, patch: PostPatch, status?: StatusChange): Promise<void>;
  appendAuditLog(entry: AuditLogEntry): Promise<void>;
  updateKeyword(keywordId: string, patch: KeywordPatch): Promise<void>;
}

export interface NewCluster {
  clientId: string;
  name: string;
  pillarKeyword: string;
  pillarSuggestedTitle: string;
}

export interface NewKeyword {
  clientId: string;
  clusterId: string | null;
  keyword: string;
  secondaryKeywords: string[];
  suggestedTitle: string;
  intent: string;
  difficulty: string;
  volume: string;
  priority: number;
  isPillar: boolean;
}

/** Keyword research and scheduling side of the store. */
export interface KeywordStore {
  listKeywordTexts(clientId: string): Promise<string[]>;
  createCluster(cluster: NewCluster): Promise<string>;
  createKeyword(keyword: NewKeyword): Promise<string>;
  listActiveClients(): Promise<Client[]>;
  countPostsSince(clientId: string, since: Date): Promise<number>;
  /** Pending keywords, priority descending then oldest first */
  listPendingKeywords(clientId: string, limit: number): Promise<SeoKeyword[]>;
}
