const TRACKING_PARAMS = new Set([
  "ref",
  "referrer",
  "fbclid",
  "gclid",
  "igshid",
  "mc_cid",
  "mc_eid",
  "cmpid",
  "spm",
]);

const TRACKING_PREFIXES = ["utm_"];

const SOCIAL_HOSTS: Record<string, string> = {
  "linkedin.com": "linkedin.com",
  "twitter.com": "twitter.com",
  "x.com": "twitter.com",
  "facebook.com": "facebook.com",
  "m.facebook.com": "facebook.com",
  "instagram.com": "instagram.com",
  "youtube.com": "youtube.com",
  "m.youtube.com": "youtube.com",
  "tiktok.com": "tiktok.com",
};

const normalizeHostname = (hostname: string) =>
  hostname.toLowerCase().replace(/^(www|[a-z]{2})\.(?=linkedin\.com$)/, "").replace(/^www\./, "");

const withScheme = (input: string) => {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  if (trimmed.startsWith("//")) {
    return `https:${trimmed}`;
  }
  return `https://${trimmed}`;
};

const isTrackingParam = (key: string) => {
  if (TRACKING_PARAMS.has(key)) {
    return true;
  }
  return TRACKING_PREFIXES.some((prefix) => key.startsWith(prefix));
};

export const normalizeUrl = (input: string): string | null => {
  if (!input.trim() || /\s/.test(input.trim())) {
    return null;
  }
  try {
    const url = new URL(withScheme(input));
    if (!url.hostname.includes(".")) {
      return null;
    }
    url.protocol = "https:";
    url.hash = "";
    url.hostname = normalizeHostname(url.hostname);

    const params = new URLSearchParams(url.search);
    const cleaned = new URLSearchParams();

    for (const [key, value] of params.entries()) {
      if (!isTrackingParam(key)) {
        cleaned.append(key, value);
      }
    }

    const cleanedParams = cleaned.toString();
    url.search = cleanedParams ? `?${cleanedParams}` : "";

    if (url.pathname.endsWith("/") && url.pathname !== "/") {
      url.pathname = url.pathname.slice(0, -1);
    }

    return url.toString();
  } catch {
    return null;
  }
};

export const getHostname = (input: string): string | null => {
  try {
    const url = new URL(withScheme(input));
    return normalizeHostname(url.hostname);
  } catch {
    return null;
  }
};

export const isSocialLink = (input: string) => {
  const hostname = getHostname(input);
  return hostname !== null && hostname in SOCIAL_HOSTS;
};

export const normalizeSocialLink = (input: string): string | null => {
  const normalized = normalizeUrl(input);
  if (!normalized) {
    return null;
  }
  const url = new URL(normalized);
  const canonicalHost = SOCIAL_HOSTS[url.hostname];
  if (!canonicalHost) {
    return normalized;
  }
  url.hostname = canonicalHost;
  url.search = "";
  url.pathname = url.pathname.toLowerCase();
  return url.toString();
};
