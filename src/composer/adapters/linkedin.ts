import { z } from 'zod';
import { errorMessage } from '../../errors.js';
import { fetchWithTimeout, type FetchLike } from '../../utils/http.js';
import type { LinkedInConfig } from '../../config.js';
import type { AuthTokens, PlatformAdapter, PublishResult } from '../types.js';

export class LinkedInApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`LinkedIn API ${status}: ${body}`);
    this.name = 'LinkedInApiError';
  }
}

export interface IdentityLookup {
  /** Resolves `urn:li:person:<sub>` for the token's owner. */
  resolvePersonUrn(accessToken: string): Promise<string>;
}

export interface CreatePostResponse {
  status: number;
  postId?: string;
  body: string;
}

export interface PublishApi {
  createPost(accessToken: string, authorUrn: string, text: string): Promise<CreatePostResponse>;
}

const userInfoSchema = z.object({ sub: z.string().min(1) });

export function buildUgcPost(authorUrn: string, text: string) {
  return {
    author: authorUrn,
    lifecycleState: 'PUBLISHED',
    specificContent: {
      'com.linkedin.ugc.ShareContent': {
        shareCommentary: { text },
        shareMediaCategory: 'NONE',
      },
    },
    visibility: {
      'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC',
    },
  };
}

export function postUrl(postId: string): string {
  return `https://www.linkedin.com/feed/update/${postId}/`;
}

export class LinkedInApi implements IdentityLookup, PublishApi {
  constructor(
    private readonly config: Pick<LinkedInConfig, 'apiUrl' | 'version' | 'timeoutMs'>,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async resolvePersonUrn(accessToken: string): Promise<string> {
    const res = await fetchWithTimeout(
      `${this.config.apiUrl}/v2/userinfo`,
      { headers: { Authorization: `Bearer ${accessToken}` } },
      this.config.timeoutMs,
      this.fetchImpl,
    );

    if (res.status !== 200) throw new LinkedInApiError(res.status, res.text);

    const parsed = userInfoSchema.safeParse(JSON.parse(res.text));
    if (!parsed.success) throw new LinkedInApiError(res.status, 'userinfo reply has no "sub" claim');
    return `urn:li:person:${parsed.data.sub}`;
  }

  async createPost(accessToken: string, authorUrn: string, text: string): Promise<CreatePostResponse> {
    const res = await fetchWithTimeout(
      `${this.config.apiUrl}/v2/ugcPosts`,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
          'X-Restli-Protocol-Version': '2.0.0',
          'LinkedIn-Version': this.config.version,
        },
        body: JSON.stringify(buildUgcPost(authorUrn, text)),
      },
      this.config.timeoutMs,
      this.fetchImpl,
    );

    return {
      status: res.status,
      postId: res.headers.get('x-restli-id') ?? undefined,
      body: res.text,
    };
  }
}

/**
 * Publishes a post as the token's owner.
 * Never throws and never retries: always returns a PublishResult.
 * A person URN resolved here is kept for later publishes from the same
 * process; it is not written back to the token file.
 */
export class LinkedInPublisher implements PlatformAdapter {
  private personUrn?: string;

  constructor(
    private readonly tokens: AuthTokens,
    private readonly api: IdentityLookup & PublishApi,
  ) {
    this.personUrn = tokens.personUrn;
  }

  async publish(content: string): Promise<PublishResult> {
    let author = this.personUrn;

    if (!author) {
      console.log('[linkedin] Fetching user info...');
      try {
        author = await this.api.resolvePersonUrn(this.tokens.accessToken);
        this.personUrn = author;
      } catch (err) {
        console.error(`[linkedin] Failed to get user info: ${errorMessage(err)}`);
        return { platform: 'linkedin', success: false, error: `Failed to get user URN: ${errorMessage(err)}` };
      }
    }

    try {
      const res = await this.api.createPost(this.tokens.accessToken, author, content);

      if (res.status !== 201) {
        console.error(`[linkedin] Failed to post: ${res.status}`);
        return { platform: 'linkedin', success: false, error: res.body };
      }

      console.log(`[linkedin] Post created. ID: ${res.postId ?? 'n/a'}`);
      return {
        platform: 'linkedin',
        success: true,
        postId: res.postId,
        url: res.postId ? postUrl(res.postId) : undefined,
      };
    } catch (err) {
      return { platform: 'linkedin', success: false, error: errorMessage(err) };
    }
  }
}
