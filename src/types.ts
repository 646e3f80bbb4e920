export const CLIENT_PLANS = ['free', 'starter', 'pro', 'agency'] as const;
export type ClientPlan = (typeof CLIENT_PLANS)[number];

export type ClientStatus = 'active' | 'trial' | 'paused' | 'cancelled';

export interface Client {
  id: string;
  name: string;
  industry: string;
  websiteUrl: string;
  brandTone: string;
  /** ISO 639-1 code the articles are written in */
  language: string;
  plan: ClientPlan;
  status: ClientStatus;
  autoPublish: boolean;
  industryInstructions: string | null;
}

export function isClientActive(client: Pick<Client, 'status'>): boolean {
  return client.status === 'active' || client.status === 'trial';
}

export interface MoneyPage {
  id: string;
  url: string;
  title: string;
  type: string;
  targetKeywords: string[];
  /** Never empty: falls back to [title] when the row has none */
  anchorTexts: string[];
  /** 1 (low) to 5 (high) */
  priority: number;
  active: boolean;
}

export interface ExistingPostRef {
  slug: string;
  title: string;
  keyword: string;
  excerpt: string;
}

export const POST_STATUSES = ['draft', 'generating', 'in_review', 'approved', 'published', 'rejected', 'failed'] as const;
export type PostStatus = (typeof POST_STATUSES)[number];

export type KeywordStatus = 'pending' | 'in_progress' | 'published' | 'discarded';
export type KeywordIntent = 'informacional' | 'transaccional' | 'navegacional';

export interface SeoKeyword {
  id: string;
  clientId: string;
  clusterId: string | null;
  keyword: string;
  secondaryKeywords: string[];
  suggestedTitle: string;
  intent: string;
  priority: number;
  isPillar: boolean;
  status: KeywordStatus;
  postId: string | null;
}

export interface GenerationRequest {
  clientId: string;
  primaryKeyword: string;
  secondaryKeywords?: string[];
  suggestedTitle?: string;
  /** Defaults to 1500 for pillar articles and 1000 otherwise */
  targetWordCount?: number;
  isPillar?: boolean;
  clusterId?: string | null;
}

export interface GenerationResult {
  postId: string;
  title: string;
  slug: string;
  metaDescription: string;
  primaryKeyword: string;
  score: number;
  passed: boolean;
  status: PostStatus;
  totalCostUsd: number;
  totalTokens: number;
  revisionCount: number;
  criticalProblems: string[];
  suggestions: string[];
}
