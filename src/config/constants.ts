/**
 * Application-wide Constants
 *
 * Centralized location for magic numbers and configuration values.
 */

/**
 * Time durations in milliseconds
 */
export const TIME = {
  ONE_SECOND: 1000,
  ONE_MINUTE: 60000,
  ONE_HOUR: 3600000,
} as const;

/**
 * Rate limiting configuration
 */
export const RATE_LIMITS = {
  /** API rate limit window */
  API_WINDOW: TIME.ONE_MINUTE,
  /** Max API requests per window */
  API_MAX_REQUESTS: 600,
  /** Auth endpoints (login/register) window */
  AUTH_WINDOW: TIME.ONE_MINUTE,
  /** Max auth requests per window */
  AUTH_MAX_REQUESTS: 20,
  /** Max IPs to track in rate limiter */
  MAX_TRACKED_IPS: 10000,
} as const;

/**
 * Result sizes carried over from the web views
 */
export const LIMITS = {
  /** Media returned by the browse endpoint */
  BROWSE_MEDIA: 50,
  /** Entries of each kind in the watch history */
  WATCH_HISTORY: 50,
  /** Watched episodes shown on a public profile */
  PROFILE_RECENT_EPISODES: 20,
  /** Cast members in enrichment payloads */
  ENRICHMENT_CAST: 15,
  /** Directors in enrichment payloads */
  ENRICHMENT_DIRECTORS: 3,
  /** Cast members in the remote details payload */
  DETAILS_CAST: 10,
  /** Directors / creators in the remote details payload */
  DETAILS_DIRECTORS: 2,
  /** Cast members attached to enriched search results */
  SEARCH_CAST: 5,
  /** Directors attached to enriched search results */
  SEARCH_DIRECTORS: 2,
  /** Highest accepted season / episode number */
  MAX_EPISODE_NUMBER: 1000,
} as const;
