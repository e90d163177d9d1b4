export const DEFAULT_MAX_OUTPUT_CHARS = 2800;

export function buildTruncationBanner(
  maxChars: number,
  includeScrollbarHint = false,
): string {
  const banner = `Output truncated. Showing the last ${maxChars} characters. You should try again and use computer.ai.summarize(output) over the output, or break it down into smaller steps.\n\n`;
  if (!includeScrollbarHint) {
    return banner;
  }
  return `${banner.trim()} Run \`get_last_output()[0:${maxChars}]\` to see the first page.\n\n`;
}

function keepTail(value: string, maxChars: number): string {
  if (maxChars <= 0) {
    return "";
  }
  return value.length <= maxChars ? value : value.slice(-maxChars);
}

/**
 * Keeps the last `maxChars` characters of a console output behind a banner.
 * A banner left by an earlier call is stripped first, so repeated calls on a
 * growing output never stack banners.
 */
export function truncateOutput(
  content: string,
  maxChars: number = DEFAULT_MAX_OUTPUT_CHARS,
  includeScrollbarHint = false,
): string {
  const banner = buildTruncationBanner(maxChars, includeScrollbarHint);
  let body = content;
  let needsTruncation = false;

  if (body.startsWith(banner)) {
    body = body.slice(banner.length);
    needsTruncation = true;
  }

  if (body.length > maxChars || needsTruncation) {
    return banner + keepTail(body, maxChars);
  }
  return body;
}
