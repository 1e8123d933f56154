// Identity normalization shared by the matcher, the index and lock keys

// Legal-form suffixes dropped from the end of organization names (as token runs)
const ORG_SUFFIXES: readonly string[][] = [
  ['national', 'association'],
  ['n', 'a'],
  ['na'],
  ['corporation'],
  ['corp'],
  ['incorporated'],
  ['inc'],
  ['company'],
  ['co'],
  ['llc'],
  ['ltd'],
  ['plc'],
];

const CONNECTORS = new Set(['&', 'and']);

function tokenize(value: string): string[] {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' & ')
    .replace(/[^a-z0-9&]+/g, ' ')
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

function endsWith(tokens: string[], suffix: readonly string[]): boolean {
  if (suffix.length >= tokens.length) {
    return false;
  }
  const offset = tokens.length - suffix.length;
  return suffix.every((part, i) => tokens[offset + i] === part);
}

/**
 * Normalize an organization name for identity comparison:
 * case-insensitive, punctuation and whitespace collapsed, legal suffixes and
 * a leading "the" removed. "JPMorgan Chase & Co." -> "jpmorganchase".
 */
export function normalizeOrgName(name: string): string {
  const tokens = tokenize(name);

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const suffix of ORG_SUFFIXES) {
      if (endsWith(tokens, suffix)) {
        tokens.splice(tokens.length - suffix.length, suffix.length);
        stripped = true;
      }
    }
    const last = tokens[tokens.length - 1];
    if (tokens.length > 1 && last !== undefined && CONNECTORS.has(last)) {
      tokens.pop();
      stripped = true;
    }
  }

  if (tokens.length > 1 && tokens[0] === 'the') {
    tokens.shift();
  }

  return tokens.filter((token) => token !== '&').join('');
}

// Person names keep word boundaries: "Dr. Jane  O'Neil" -> "dr jane o neil"
export function normalizePersonName(name: string): string {
  return tokenize(name)
    .filter((token) => token !== '&')
    .join(' ');
}

// Department names compare like person names
export const normalizeDepartmentName = normalizePersonName;

/**
 * Normalize an external profile handle. Accepts a bare handle or a profile URL
 * ("https://www.example.com/in/jane-doe/" -> "jane-doe").
 */
export function normalizeHandle(handle: string): string {
  const trimmed = handle.trim().toLowerCase();
  const fromUrl = /\/in\/([^/?#]+)/.exec(trimmed);
  const bare = fromUrl?.[1] ?? trimmed;
  return bare.replace(/^@/, '').replace(/\/+$/, '');
}

// Lookup and identity keys
export const keys = {
  cert: (certId: number) => `CERT:${certId}`,
  bankName: (name: string) => `NAME:${normalizeOrgName(name)}`,
  handle: (handle: string) => `HANDLE:${normalizeHandle(handle)}`,
  person: (name: string, employer: string) =>
    `PERSON:${normalizePersonName(name)}|${normalizeOrgName(employer)}`,
  // Name scoped to the bank that lists the person, for leaders of banks known only by id
  personAt: (name: string, bankKey: string) => `PERSON:${normalizePersonName(name)}@${bankKey}`,
  personName: (name: string) => `PNAME:${normalizePersonName(name)}`,
};
