import { ClassicGroupEndpoint, OS_VERSION_FIELD } from '../types/jamf-api.js';
import { OsVersionMember } from '../report/os-versions.js';
import { GroupResult } from '../report/types.js';

const decodeXml = (s: string): string => {
  return String(s ?? '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
};

// Nested blocks that carry their own <name> elements.
const NAMED_CHILD_BLOCKS = ['site', 'criteria', 'display_fields'];

const blockPattern = (tag: string, flags = 'i'): RegExp =>
  new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, flags);

const emptyElementPattern = (tag: string): RegExp => new RegExp(`<${tag}\\s*/>`, 'i');

const openTagPattern = (tag: string): RegExp => new RegExp(`<${tag}(?:\\s[^>]*)?>`, 'gi');

/**
 * Inner text of the members container, '' for an empty element, or
 * undefined when the container is missing altogether
 */
const findMembersBlock = (text: string, membersKey: string): string | undefined => {
  const match = text.match(blockPattern(membersKey));
  if (match) return match[1] ?? '';
  return emptyElementPattern(membersKey).test(text) ? '' : undefined;
};

export const parseGroupSummaryFromXml = (
  xml: string,
  endpoint: Pick<ClassicGroupEndpoint, 'membersKey' | 'memberTag'>
): GroupResult | null => {
  const text = String(xml ?? '');

  const membersBlock = findMembersBlock(text, endpoint.membersKey);
  if (membersBlock === undefined) return null;

  let header = text.replace(blockPattern(endpoint.membersKey, 'gi'), '');
  for (const tag of NAMED_CHILD_BLOCKS) {
    header = header.replace(blockPattern(tag, 'gi'), '');
  }

  const nameMatch = header.match(/<name>\s*([\s\S]*?)\s*<\/name>/i);
  const name = nameMatch ? decodeXml((nameMatch[1] ?? '').trim()) : '';
  if (!name) return null;

  const sizeMatch = membersBlock.match(/<size>\s*([0-9]+)\s*<\/size>/i);
  const count = sizeMatch
    ? Number(sizeMatch[1])
    : (membersBlock.match(openTagPattern(endpoint.memberTag)) ?? []).length;

  return { name, count };
};

export const parseOsVersionsFromXml = (xml: string): OsVersionMember[] | null => {
  const text = String(xml ?? '');

  const membersBlock = findMembersBlock(text, 'computers');
  if (membersBlock === undefined) return null;

  const members: OsVersionMember[] = [];
  for (const m of membersBlock.matchAll(blockPattern('computer', 'gi'))) {
    const inner = m[1] ?? '';
    const versionMatch = inner.match(blockPattern(OS_VERSION_FIELD));
    const osVersion = versionMatch ? decodeXml((versionMatch[1] ?? '').trim()) : '';
    members.push(osVersion ? { osVersion } : {});
  }

  return members;
};
