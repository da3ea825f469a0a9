export type Platform = 'linkedin';

export const POST_TYPES = [
  'technical_tip',
  'career_insight',
  'trend_analysis',
  'personal_story',
  'hot_take',
] as const;

export type PostType = (typeof POST_TYPES)[number];

export interface TopicCandidate {
  title: string;
  body: string;
  source: string;
  published: string;
}

export interface TopicDecision {
  selected_topic: string;
  why_selected: string;
  post_angle: string;
  post_type: PostType;
}

export interface AuthTokens {
  accessToken: string;
  personUrn?: string;
}

export interface PublishResult {
  platform: Platform;
  success: boolean;
  postId?: string;
  url?: string;
  error?: string;
}

export interface HistoryEntry {
  date: string;
  topic: string;
  post_preview: string;
  post_id: string;
}

export interface PostHistory {
  posts: HistoryEntry[];
}

export interface PlatformAdapter {
  publish(content: string): Promise<PublishResult>;
}
