import {
  ErrorKind,
  RetrievalError,
} from '../common/errors/retrieval.error';

// Matches /reel/<shortcode> and /p/<shortcode>
const SHORTCODE_PATTERN = /instagram\.com\/(?:reel|p)\/([^/?#&]+)/;
// shortcodes double as artifact directory names
const SHORTCODE_CHARS = /^[A-Za-z0-9_-]+$/;

export function extractShortcode(postUrl: string): string {
  const match = SHORTCODE_PATTERN.exec(postUrl);
  if (!match || !SHORTCODE_CHARS.test(match[1])) {
    throw new RetrievalError(
      ErrorKind.InvalidInput,
      'Could not parse shortcode from URL. Ensure it is a valid Instagram post or reel URL.',
    );
  }
  return match[1];
}
