const URL_CHAR = "[a-z0-9$\\-_.+!*'(),;?&=]|%[a-f0-9]{2}";
const USERINFO = `(?:(?:${URL_CHAR}){1,64}(?::(?:${URL_CHAR}){1,25})?@)?`;

// Only consulted for bare hosts; with a scheme any label is accepted as the TLD.
const TLDS = [
  'aero|a[cdefgilmnoqrstuwxz]',
  'biz|bike|bot|b[abdefghijmnorstvwyz]',
  'com|c[acdfghiklmnoruvxyz]',
  'd[ejkmoz]',
  'edu|e[cegrstu]',
  'fyi|f[ijkmor]',
  'gov|g[abdefghilmnpqrstuwy]',
  'how|h[kmnrtu]',
  'info|i[delmnoqrst]',
  'jobs|j[emop]',
  'k[eghimnrwyz]',
  'l[abcikrstuvy]',
  'mil|mobi|moe|m[acdeghklmnopqrstuvwxyz]',
  'name|net|n[acefgilopruz]',
  'org|om',
  'pro|p[aefghklmnrstwy]',
  'qa',
  'r[eouw]',
  's[abcdeghijklmnortuvyz]',
  't[cdfghjklmnoprtvwz]',
  'u[agkmsyz]',
  'vote|v[ceginu]',
  'xxx',
  'watch|w[fs]',
  'y[etu]',
  'z[amw]',
].join('|');

const OCTET_HEAD = '25[0-5]|2[0-4][0-9]|[0-1][0-9]{2}|[1-9][0-9]|[1-9]';
const OCTET = '25[0-5]|2[0-4][0-9]|[0-1][0-9]{2}|[1-9][0-9]|[0-9]';
const IPV4 = `(?:${OCTET_HEAD})\\.(?:${OCTET})\\.(?:${OCTET})\\.(?:${OCTET})`;

const LABEL = '[a-z0-9][a-z0-9\\-]{0,64}';
const PORT = '(?::\\d{1,5})?';
const PATH = "(?:\\/(?:[a-z0-9;\\/?:@&=#~\\-.+!*'(),_]|%[a-f0-9]{2})*)?";

const SCHEMED = `(?:https?|rtsp):\\/\\/${USERINFO}(?:(?:${LABEL}\\.)*[a-z][a-z0-9\\-]*|${IPV4})${PORT}${PATH}`;
const BARE = `(?:(?:${LABEL}\\.)+(?:${TLDS})|${IPV4})${PORT}${PATH}(?:\\b|$)`;

const URI_SCHEMES = ['magnet', 'mailto', 'ed2k', 'irc', 'ircs', 'skype', 'ymsgr', 'xfire', 'steam', 'aim', 'spotify'].join('|');
// `magnet:?xt=...` and `steam://run/...` alike; the scheme must start a word and be followed by a target.
const OTHER = `\\b(?:${URI_SCHEMES}):(?:\\/\\/)?[^\\s]+|\\.[a-z]+\\/`;

const LINK_SOURCE = `${SCHEMED}|${BARE}|${OTHER}`;

const LINK_RE = new RegExp(LINK_SOURCE, 'i');
const URI_SCHEME_RE = new RegExp(`^(?:${URI_SCHEMES}):`, 'i');

export function containsLink(text: string): boolean {
  return LINK_RE.test(text);
}

export function findLinks(text: string): string[] {
  return Array.from(text.matchAll(new RegExp(LINK_SOURCE, 'gi')), (m) => m[0]);
}

/**
 * Lower-cased host of a matched link, without scheme, credentials, port or path.
 * Non-web schemes (magnet, mailto, ...) have no host and never match a whitelist.
 */
export function linkHost(link: string): string {
  if (URI_SCHEME_RE.test(link)) return '';
  const withoutScheme = link.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '');
  const afterAuth = withoutScheme.includes('@') ? withoutScheme.slice(withoutScheme.indexOf('@') + 1) : withoutScheme;
  return afterAuth.split(/[/:?#]/)[0].toLowerCase();
}

export function hostMatches(host: string, domain: string): boolean {
  const d = domain.trim().toLowerCase().replace(/^\*?\./, '');
  return !!d && (host === d || host.endsWith(`.${d}`));
}

export function isClipLink(link: string, channelLogin: string | null): boolean {
  const host = linkHost(link);
  if (host === 'clips.twitch.tv') return true;
  if (!channelLogin || !hostMatches(host, 'twitch.tv')) return false;
  const path = link.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').slice(host.length).toLowerCase();
  return path.startsWith(`/${channelLogin.toLowerCase()}/clip/`);
}
