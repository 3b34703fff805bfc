import { createHash, createHmac } from 'crypto';

export type HostKeyMarker = 'revoked' | 'cert-authority';

export type HostKeyVerdict = 'trusted' | 'unknown' | 'mismatch' | 'revoked';

export interface KnownHostEntry {
  marker?: HostKeyMarker;
  /**
   * @description Plain host patterns; empty for hashed entries.
   */
  patterns: string[];
  hashed?: { salt: Buffer; hash: Buffer };
  keyType: string;
  key: Buffer;
  line: number;
}

/**
 * Parses an OpenSSH known_hosts file. Lines that cannot be parsed are skipped.
 */
export function parseKnownHosts(text: string): KnownHostEntry[] {
  const entries: KnownHostEntry[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const trimmed = rawLine.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) return;

    const fields = trimmed.split(/\s+/);
    let marker: HostKeyMarker | undefined;
    if (fields[0] === '@revoked') {
      marker = 'revoked';
      fields.shift();
    } else if (fields[0] === '@cert-authority') {
      marker = 'cert-authority';
      fields.shift();
    } else if (fields[0].startsWith('@')) {
      return;
    }

    if (fields.length < 3) return;
    const [hosts, keyType, encodedKey] = fields;

    const key = Buffer.from(encodedKey, 'base64');
    if (key.length === 0) return;

    const entry: KnownHostEntry = {
      marker,
      patterns: [],
      keyType,
      key,
      line: index + 1,
    };

    if (hosts.startsWith('|1|')) {
      const [salt, hash] = hosts.slice(3).split('|');
      if (!salt || !hash) return;
      entry.hashed = {
        salt: Buffer.from(salt, 'base64'),
        hash: Buffer.from(hash, 'base64'),
      };
    } else {
      entry.patterns = hosts.split(',').filter((p) => p.length > 0);
    }

    entries.push(entry);
  });

  return entries;
}

/**
 * The name known_hosts records for a host: "[host]:port" off port 22.
 */
export function hostToken(host: string, port: number): string {
  return port === 22 ? host : `[${host}]:${port}`;
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`, 'i');
}

export function entryMatchesHost(entry: KnownHostEntry, token: string): boolean {
  if (entry.hashed) {
    const digest = createHmac('sha1', entry.hashed.salt)
      .update(token)
      .digest();
    return digest.equals(entry.hashed.hash);
  }

  let matched = false;
  for (const pattern of entry.patterns) {
    const negated = pattern.startsWith('!');
    const glob = negated ? pattern.slice(1) : pattern;
    if (globToRegExp(glob).test(token)) {
      if (negated) return false;
      matched = true;
    }
  }
  return matched;
}

/**
 * Key type ("ssh-ed25519", "ssh-rsa", ...) encoded at the head of a raw
 * public key blob.
 */
export function keyTypeOf(key: Buffer): string | undefined {
  if (key.length < 4) return undefined;
  const length = key.readUInt32BE(0);
  if (length === 0 || key.length < 4 + length) return undefined;
  return key.subarray(4, 4 + length).toString('ascii');
}

/**
 * OpenSSH-style SHA256 fingerprint of a raw public key blob.
 */
export function fingerprint(key: Buffer): string {
  const digest = createHash('sha256').update(key).digest('base64');
  return `SHA256:${digest.replace(/=+$/, '')}`;
}

export function verifyHostKey(
  entries: KnownHostEntry[],
  host: string,
  port: number,
  key: Buffer
): HostKeyVerdict {
  const token = hostToken(host, port);
  const relevant = entries.filter(
    (entry) =>
      entry.marker !== 'cert-authority' && entryMatchesHost(entry, token)
  );

  if (
    relevant.some((entry) => entry.marker === 'revoked' && entry.key.equals(key))
  ) {
    return 'revoked';
  }

  const plain = relevant.filter((entry) => entry.marker === undefined);
  if (plain.some((entry) => entry.key.equals(key))) {
    return 'trusted';
  }

  const presentedType = keyTypeOf(key);
  if (plain.some((entry) => entry.keyType === presentedType)) {
    return 'mismatch';
  }

  return 'unknown';
}
