import { stripTrailingPunctuation } from '../utils/text';
import { IncomingMessage } from './updates';

const SCHEME_URL_REGEX = /\b([a-z][a-z0-9+.-]{1,31}:\/\/[^\s<>"']+)/gi;
const BARE_DOMAIN_REGEX = /(^|[^\p{L}\p{N}_@-])((?:www\.)?(?:[\p{L}\p{N}](?:[\p{L}\p{N}-]{0,61}[\p{L}\p{N}])?\.)+(?:xn--[a-z0-9-]{2,59}|[\p{L}]{2,63})(?::\d{2,5})?(?:\/[^\s<>"']*)?)/giu;
const IPV4_REGEX = /\b((?:\d{1,3}\.){3}\d{1,3}(?::\d{2,5})?(?:\/[^\s<>"']*)?)/g;
const HTML_HREF_REGEX = /href\s*=\s*["']([^"']+)["']/gi;
const URL_FIELD_KEYS = new Set(['url', 'link', 'href']);

function normalizeCandidate(rawCandidate: string): string {
  const trimmed = rawCandidate.trim()
    .replace(/^[<([{"'`]+/g, '')
    .replace(/[>\])}"'`]+$/g, '');
  return stripTrailingPunctuation(trimmed);
}

function isValidIpv4(candidate: string): boolean {
  const host = candidate.split(/[:/]/)[0] ?? '';
  const parts = host.split('.');
  return parts.length === 4 && parts.every((part) => Number(part) >= 0 && Number(part) <= 255);
}

function collect(text: string, regex: RegExp, captureIndex: number, out: Set<string>): void {
  regex.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(text)) !== null) {
    const raw = match[captureIndex];
    if (!raw) continue;

    const candidate = normalizeCandidate(raw);
    if (candidate) out.add(candidate);
  }
}

export function extractLinks(text: string | null | undefined): string[] {
  const normalized = text?.trim();
  if (!normalized) return [];

  const found = new Set<string>();
  collect(normalized, SCHEME_URL_REGEX, 1, found);
  collect(normalized, HTML_HREF_REGEX, 1, found);

  const withoutSchemeUrls = normalized.replace(SCHEME_URL_REGEX, ' ');
  collect(withoutSchemeUrls, BARE_DOMAIN_REGEX, 2, found);

  const ipv4 = new Set<string>();
  collect(withoutSchemeUrls, IPV4_REGEX, 1, ipv4);
  for (const candidate of ipv4) {
    if (isValidIpv4(candidate)) found.add(candidate);
  }

  return [...found];
}

export function findUnlistedLinks(links: string[], whitelist: string[]): string[] {
  const entries = whitelist.map((entry) => entry.trim().toLowerCase()).filter(Boolean);
  return links.filter((link) => {
    const lowered = link.toLowerCase();
    return !entries.some((entry) => lowered.includes(entry));
  });
}

function collectUrlFields(value: unknown, out: string[], seen: WeakSet<object>): void {
  if (!value || typeof value !== 'object') return;
  if (seen.has(value)) return;
  seen.add(value);

  if (Array.isArray(value)) {
    for (const item of value) collectUrlFields(item, out, seen);
    return;
  }

  for (const [key, nested] of Object.entries(value)) {
    if (typeof nested === 'string' && URL_FIELD_KEYS.has(key.toLowerCase())) {
      out.push(nested);
      continue;
    }
    collectUrlFields(nested, out, seen);
  }
}

export function collectModeratedText(message: IncomingMessage): string {
  const parts: string[] = [];
  const seen = new WeakSet<object>();

  if (message.body.text) parts.push(message.body.text);

  const linked = message.link?.message;
  if (linked?.text) parts.push(linked.text);

  for (const markup of [...(message.body.markup ?? []), ...(linked?.markup ?? [])]) {
    collectUrlFields(markup, parts, seen);
  }

  for (const attachment of message.body.attachments ?? []) {
    if (isKeyboardAttachment(attachment)) {
      collectUrlFields(attachment, parts, seen);
    }
  }

  return parts.join('\n');
}

function isKeyboardAttachment(attachment: unknown): boolean {
  return Boolean(attachment)
    && typeof attachment === 'object'
    && attachment !== null
    && 'type' in attachment
    && attachment.type === 'inline_keyboard';
}
