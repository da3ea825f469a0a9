import type { TopicCandidate } from '../composer/types.js';

export const MAX_CANDIDATES = 5;

/** Used when every search query comes back empty. */
export const FALLBACK_TOPICS: readonly TopicCandidate[] = Object.freeze([
  {
    title: 'Kotlin 2.0 and the future of Android development',
    body: 'Kotlin 2.0 brings major improvements to the language including better performance and new features',
    source: 'Android Weekly',
    published: 'recent',
  },
  {
    title: 'Jetpack Compose performance optimization techniques',
    body: 'Best practices for building smooth 60fps UIs with Compose including recomposition optimization',
    source: 'Android Developers Blog',
    published: 'recent',
  },
  {
    title: 'Android 15 new features for developers',
    body: 'Latest Android version brings new APIs and capabilities for app developers',
    source: 'Google',
    published: 'recent',
  },
  {
    title: 'Health Connect SDK integration patterns',
    body: 'Building health and fitness apps with Google Health Connect SDK best practices',
    source: 'Android Health',
    published: 'recent',
  },
  {
    title: 'Modern Android app architecture with MVI pattern',
    body: 'Moving beyond MVVM to Model-View-Intent for better state management',
    source: 'ProAndroidDev',
    published: 'recent',
  },
]);

export function titleKey(title: string): string {
  return title.toLowerCase();
}

export function dedupeCandidates(candidates: TopicCandidate[]): TopicCandidate[] {
  const seen = new Set<string>();
  const unique: TopicCandidate[] = [];

  for (const candidate of candidates) {
    if (!candidate.title) continue;
    const key = titleKey(candidate.title);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(candidate);
  }

  return unique;
}

export function shortlistCandidates(
  candidates: TopicCandidate[],
  max = MAX_CANDIDATES,
): TopicCandidate[] {
  let unique = dedupeCandidates(candidates);

  if (unique.length === 0) {
    console.warn('[shortlist] No search results. Using fallback topics.');
    unique = FALLBACK_TOPICS.map((topic) => ({ ...topic }));
  }

  const shortlist = unique.slice(0, max);
  for (const c of shortlist) console.log(`[shortlist]   ${c.title.slice(0, 60)}`);
  return shortlist;
}
