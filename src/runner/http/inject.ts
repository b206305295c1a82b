/* src/runner/http/inject.ts
 * Embed the live-reload client script into an HTML body.
 */
import { readFileSync } from 'node:fs';

const PORT_PLACEHOLDER = '__DEVRELAY_RELOAD_PORT__';

let clientTemplate: string | undefined;
const template = (): string => {
  clientTemplate ??= readFileSync(
    new URL('./reload-client.js', import.meta.url),
    'utf8',
  );
  return clientTemplate;
};

/** The `<script>` block embedded into HTML pages for a given reload port. */
export const reloadScript = (port: number): string =>
  `<script>\n${template().replace(PORT_PLACEHOLDER, String(port))}</script>`;

const BODY_CLOSE = Buffer.from('</body>');
const COMMENT_OPEN = Buffer.from('<!--');
const COMMENT_CLOSE = Buffer.from('-->');

const startsWithAt = (buf: Buffer, i: number, needle: Buffer): boolean =>
  i + needle.length <= buf.length &&
  buf.compare(needle, 0, needle.length, i, i + needle.length) === 0;

/**
 * Index of the first `</body>` outside an HTML comment, or undefined.
 * Single linear pass tracking whether the cursor is inside `<!-- ... -->`.
 */
export const findBodyClose = (input: Buffer): number | undefined => {
  let inComment = false;
  for (let i = 0; i < input.length; i++) {
    if (inComment) {
      if (startsWithAt(input, i, COMMENT_CLOSE)) {
        inComment = false;
        i += COMMENT_CLOSE.length - 1;
      }
    } else if (startsWithAt(input, i, BODY_CLOSE)) {
      return i;
    } else if (startsWithAt(input, i, COMMENT_OPEN)) {
      // No skip: the dashes of "<!--" may also start "-->", as in "<!-->".
      inComment = true;
    }
  }
  return undefined;
};

/**
 * Insert `script` right before the first unguarded `</body>`; append it to
 * the end when there is none.
 */
export const injectInto = (input: Buffer, script: string): Buffer => {
  const at = findBodyClose(input) ?? input.length;
  return Buffer.concat([
    input.subarray(0, at),
    Buffer.from(script, 'utf8'),
    input.subarray(at),
  ]);
};
