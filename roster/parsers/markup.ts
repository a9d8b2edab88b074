import { Parser } from "htmlparser2";
import { decodeHTML, decodeHTMLStrict } from "entities";
import type { Attribute, MarkupEvent } from "../roster.types.js";

// Legacy references ("&nbsp", "&amp") may omit the closing ";".
const REFERENCE = /&(#[xX][0-9a-fA-F]+|#[0-9]+|[A-Za-z][A-Za-z0-9]*)(;?)/g;

/** Decode a named or numeric reference ("amp", "#38"); null when unknown. */
export function decodeEntity(name: string): string | null {
  const raw = `&${name};`;
  const decoded = decodeHTMLStrict(raw);
  return decoded === raw ? null : decoded;
}

// Longest prefix of `name` that is a reference without its ";"
function legacyPrefix(name: string): string | null {
  for (let end = name.length; end > 0; end--) {
    const candidate = name.slice(0, end);
    const decoded = decodeEntity(candidate);
    if (decoded !== null && decodeHTML(`&${candidate}`) === decoded) return candidate;
  }
  return null;
}

function emitText(raw: string, onEvent: (event: MarkupEvent) => void) {
  let pending = "";
  let last = 0;
  const entity = (name: string) => {
    if (pending) onEvent({ kind: "text", content: pending });
    pending = "";
    onEvent({ kind: "entity", name });
  };

  for (const m of raw.matchAll(REFERENCE)) {
    const at = m.index ?? 0;
    pending += raw.slice(last, at);
    last = at + m[0].length;
    const [whole, name, semicolon] = m;
    if (semicolon) {
      entity(name);
      continue;
    }
    const prefix = legacyPrefix(name);
    if (prefix === null) {
      pending += whole;
      continue;
    }
    entity(prefix);
    pending += name.slice(prefix.length);
  }
  pending += raw.slice(last);
  if (pending) onEvent({ kind: "text", content: pending });
}

/**
 * Stream `html` as markup events in document order.
 *
 * Entity and character references in text come through as separate
 * `entity` events. Attribute values are decoded. A self-closed tag
 * (`<span/>`) is reported as a start tag followed by its end tag. Start and
 * end tags the tokenizer only implies (void elements, auto-closed elements,
 * tags still open at end of input) are not reported.
 */
export function tokenize(html: string, onEvent: (event: MarkupEvent) => void): void {
  let attributes: Attribute[] = [];
  let text = "";

  const flush = () => {
    if (!text) return;
    const pending = text;
    text = "";
    emitText(pending, onEvent);
  };

  const parser = new Parser(
    {
      onopentagname() {
        flush();
        attributes = [];
      },
      onattribute(name, value) {
        attributes.push({ name, value: decodeHTML(value) });
      },
      onopentag(name, _attribs, isImplied) {
        const collected = attributes;
        attributes = [];
        if (isImplied) return;
        onEvent({ kind: "start_tag", name, attributes: collected });
        // endIndex sits on the tag's ">"; the parser's own close for it is implied
        if (html[parser.endIndex - 1] === "/") onEvent({ kind: "end_tag", name });
      },
      ontext(data) {
        text += data;
      },
      onclosetag(name, isImplied) {
        flush();
        if (isImplied) return;
        onEvent({ kind: "end_tag", name });
      },
      oncomment() {
        flush();
      },
      onend() {
        flush();
      },
    },
    { decodeEntities: false, recognizeSelfClosing: true }
  );

  parser.write(html);
  parser.end();
}

export function attributeValue(attributes: Attribute[], name: string): string | undefined {
  return attributes.find(a => a.name === name)?.value;
}
