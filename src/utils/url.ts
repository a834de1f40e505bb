/**
 * Source URL classification.
 *
 * Hosts are matched exactly or as a proper subdomain of an allow-listed
 * domain, and identifiers come from structural URL parts only. Anything that
 * fails to parse or match is rejected; the raw text is never scanned.
 */

export type Platform = "youtube" | "bilibili" | "apple_podcasts";

export interface SourceDescriptor {
  platform: Platform;
  stableId: string;
}

export interface PlatformInfo {
  displayName: string;
  scratchPrefix: string;
}

export const PLATFORMS: Record<Platform, PlatformInfo> = {
  youtube: { displayName: "YouTube", scratchPrefix: "yt" },
  bilibili: { displayName: "Bilibili", scratchPrefix: "bili" },
  apple_podcasts: { displayName: "Apple Podcasts", scratchPrefix: "pod" },
};

const YOUTUBE_DOMAINS = ["youtube.com", "youtube-nocookie.com"];
const YOUTUBE_SHORT_DOMAINS = ["youtu.be"];
const YOUTUBE_ID_PATH_PREFIXES = new Set(["shorts", "embed", "live", "v"]);
const YOUTUBE_VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

const BILIBILI_DOMAINS = ["bilibili.com"];
const BILIBILI_SHORT_DOMAINS = ["b23.tv"];
const BILIBILI_BV_ID = /^BV[0-9A-Za-z]{10}$/;
const BILIBILI_AV_ID = /^av\d+$/i;
const BILIBILI_SHORT_CODE = /^[0-9A-Za-z]+$/;

const APPLE_PODCAST_DOMAINS = ["podcasts.apple.com"];
const APPLE_SHOW_SEGMENT = /^id(\d+)$/;
const NUMERIC = /^\d+$/;

/** `host` equals `domain` or is a subdomain of it. */
export function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function hostMatchesAny(host: string, domains: readonly string[]): boolean {
  return domains.some((domain) => hostMatches(host, domain));
}

function parseHttpUrl(text: string): URL | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  return url;
}

function normalizedHost(url: URL): string {
  return url.hostname.toLowerCase().replace(/\.$/, "");
}

function pathSegments(url: URL): string[] {
  return url.pathname.split("/").filter(Boolean);
}

export function extractYouTubeId(text: string): string | null {
  const url = parseHttpUrl(text);
  if (!url) return null;
  const host = normalizedHost(url);
  const segments = pathSegments(url);

  let candidate: string | null = null;
  if (hostMatchesAny(host, YOUTUBE_SHORT_DOMAINS)) {
    candidate = segments[0] ?? null;
  } else if (hostMatchesAny(host, YOUTUBE_DOMAINS)) {
    if (segments.length === 1 && segments[0] === "watch") {
      candidate = url.searchParams.get("v");
    } else if (segments.length >= 2 && YOUTUBE_ID_PATH_PREFIXES.has(segments[0])) {
      candidate = segments[1];
    }
  }

  return candidate && YOUTUBE_VIDEO_ID.test(candidate) ? candidate : null;
}

export function extractBilibiliId(text: string): string | null {
  const url = parseHttpUrl(text);
  if (!url) return null;
  const host = normalizedHost(url);
  const segments = pathSegments(url);

  if (hostMatchesAny(host, BILIBILI_SHORT_DOMAINS)) {
    const code = segments[0];
    return code && BILIBILI_SHORT_CODE.test(code) ? code : null;
  }
  if (hostMatchesAny(host, BILIBILI_DOMAINS) && segments[0] === "video") {
    const code = segments[1];
    if (code && (BILIBILI_BV_ID.test(code) || BILIBILI_AV_ID.test(code))) {
      return code;
    }
  }
  return null;
}

export function extractApplePodcastsId(text: string): string | null {
  const url = parseHttpUrl(text);
  if (!url) return null;
  if (!hostMatchesAny(normalizedHost(url), APPLE_PODCAST_DOMAINS)) return null;

  let showId: string | null = null;
  for (const segment of pathSegments(url)) {
    const match = APPLE_SHOW_SEGMENT.exec(segment);
    if (match) {
      showId = match[1];
      break;
    }
  }
  if (!showId) return null;

  const episodeId = url.searchParams.get("i");
  return episodeId && NUMERIC.test(episodeId) ? `${showId}_${episodeId}` : showId;
}

const EXTRACTORS: ReadonlyArray<[Platform, (text: string) => string | null]> = [
  ["youtube", extractYouTubeId],
  ["bilibili", extractBilibiliId],
  ["apple_podcasts", extractApplePodcastsId],
];

/** Checks platforms in priority order and returns the first match. */
export function classify(text: string): SourceDescriptor | null {
  for (const [platform, extract] of EXTRACTORS) {
    const stableId = extract(text);
    if (stableId) return { platform, stableId };
  }
  return null;
}

export function platformOf(text: string): Platform | null {
  return classify(text)?.platform ?? null;
}

export function isSupportedUrl(text: string): boolean {
  return platformOf(text) !== null;
}
