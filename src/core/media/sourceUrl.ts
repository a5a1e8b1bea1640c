import { PipelineError } from "../errors/PipelineError";

const allowedProtocols = new Set(["http:", "https:"]);

const urlInTextPattern = /https?:\/\/[^\s<>"]+|www\.[^\s<>"]+/gi;
const trailingPunctuation = /[.,;:!?)\]]+$/;

export const normalizeSourceUrl = (raw: string): string => {
  const trimmed = raw.trim();
  if (/^www\./i.test(trimmed)) return `https://${trimmed}`;
  return trimmed;
};

/**
 * Only absolute http(s) URLs with a host and no embedded credentials are fetched.
 */
export const validateSourceUrl = (raw: string): URL => {
  const normalized = normalizeSourceUrl(raw);
  let parsed: URL;
  try {
    parsed = new URL(normalized);
  } catch {
    throw new PipelineError({
      code: "InvalidSource",
      message: `Source must be an absolute http/https URL. Received: ${raw}`
    });
  }

  if (!allowedProtocols.has(parsed.protocol)) {
    throw new PipelineError({
      code: "InvalidSource",
      message: `Source scheme ${parsed.protocol} is not allowed`,
      context: { url: safeUrlForLog(parsed) }
    });
  }
  if (parsed.hostname === "") {
    throw new PipelineError({ code: "InvalidSource", message: "Source URL has no host" });
  }
  if (parsed.username !== "" || parsed.password !== "") {
    throw new PipelineError({
      code: "InvalidSource",
      message: "Source URL must not embed credentials",
      context: { url: safeUrlForLog(parsed) }
    });
  }

  return parsed;
};

export const safeUrlForLog = (url: URL | string): string => {
  if (typeof url === "string") {
    try {
      return safeUrlForLog(new URL(url));
    } catch {
      return "<invalid-url>";
    }
  }
  return `${url.origin}${url.pathname}`;
};

/**
 * Pulls every http(s):// or www. link out of a free-text message, in order, without duplicates.
 */
export const extractUrls = (text: string): string[] => {
  const seen = new Set<string>();
  for (const match of text.match(urlInTextPattern) ?? []) {
    const url = normalizeSourceUrl(match.replace(trailingPunctuation, ""));
    seen.add(url);
  }
  return Array.from(seen);
};
