import createDOMPurify, { type DOMPurify } from "dompurify";
import { JSDOM } from "jsdom";

export const ALLOWED_TAGS = [
  "a",
  "b",
  "strong",
  "i",
  "em",
  "u",
  "del",
  "code",
  "ul",
  "ol",
  "li",
  "pre",
  "blockquote",
  "p",
  "br",
];

export const ALLOWED_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  a: ["href", "data-mention-type", "contenteditable"],
  ol: ["start"],
};

let purifier: DOMPurify | null = null;

/** The page's window in a browser, a jsdom window under Node. */
export function purifierWindow() {
  return typeof window !== "undefined" ? window : new JSDOM("").window;
}

function getPurifier(): DOMPurify {
  if (purifier) {
    return purifier;
  }

  const instance = createDOMPurify(purifierWindow());
  // ALLOWED_ATTR is global; restrict each attribute to its own tags.
  instance.addHook("uponSanitizeAttribute", (node, data) => {
    const allowed = ALLOWED_ATTRIBUTES[node.nodeName.toLowerCase()] ?? [];
    if (!allowed.includes(data.attrName)) {
      data.keepAttr = false;
    }
  });
  purifier = instance;
  return instance;
}

/**
 * Strips everything outside the allow-list. Disallowed elements are unwrapped
 * and keep their text, except script-like elements which are dropped whole.
 */
export function sanitizeHtml(html: string): string {
  return getPurifier().sanitize(html, {
    ALLOWED_TAGS,
    ALLOWED_ATTR: Object.values(ALLOWED_ATTRIBUTES).flat(),
    ALLOW_DATA_ATTR: false,
    KEEP_CONTENT: true,
  });
}
