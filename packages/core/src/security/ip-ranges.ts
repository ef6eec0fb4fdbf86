import { BlockList, isIP, isIPv4, isIPv6 } from 'node:net';

export type IpFamily = 'ipv4' | 'ipv6';

interface ReservedRange {
	cidr: string;
	label: string;
	family: IpFamily;
	list: BlockList;
}

function range(cidr: string, label: string): ReservedRange {
	const [network, prefix] = cidr.split('/');
	const family: IpFamily = isIPv6(network) ? 'ipv6' : 'ipv4';
	const list = new BlockList();
	list.addSubnet(network, Number(prefix), family);
	return { cidr, label, family, list };
}

const RESERVED_IPV4 = [
	range('127.0.0.0/8', 'loopback'),
	range('10.0.0.0/8', 'private-use'),
	range('172.16.0.0/12', 'private-use'),
	range('192.168.0.0/16', 'private-use'),
	range('169.254.0.0/16', 'link-local'),
	range('0.0.0.0/8', '"this" network'),
	range('100.64.0.0/10', 'shared address space'),
	range('192.0.0.0/24', 'IETF protocol assignments'),
	range('192.0.2.0/24', 'documentation'),
	range('198.51.100.0/24', 'documentation'),
	range('203.0.113.0/24', 'documentation'),
	range('224.0.0.0/4', 'multicast'),
	range('240.0.0.0/4', 'reserved'),
	range('255.255.255.255/32', 'limited broadcast'),
];

const RESERVED_IPV6 = [
	range('::1/128', 'loopback'),
	range('::/128', 'unspecified'),
	range('::ffff:0:0/96', 'IPv4-mapped'),
	range('fc00::/7', 'unique local'),
	range('fe80::/10', 'link-local'),
	range('ff00::/8', 'multicast'),
	range('100::/64', 'discard-only'),
	range('2001:db8::/32', 'documentation'),
	range('2001::/32', 'Teredo'),
];

/** Cloud metadata endpoints, compared after normalization. */
const METADATA_ADDRESSES = new Set(['169.254.169.254', '169.254.170.2', 'fd00:ec2:0:0:0:0:0:254']);

export interface IpClassification {
	reserved: boolean;
	reason: string;
}

/** Strips the brackets URL hostnames put around IPv6 literals. */
export function unbracket(host: string): string {
	return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Expands an IPv6 literal into its eight hextets. Accepts "::" compression and
 * a trailing dotted IPv4 tail. Returns null for anything that is not IPv6.
 */
export function expandIpv6(address: string): number[] | null {
	const bare = unbracket(address).split('%')[0];
	if (!isIPv6(bare)) return null;

	let text = bare.toLowerCase();
	const dotted = /(\d+\.\d+\.\d+\.\d+)$/.exec(text);
	if (dotted) {
		const octets = dotted[1].split('.').map(Number);
		const high = ((octets[0] << 8) | octets[1]).toString(16);
		const low = ((octets[2] << 8) | octets[3]).toString(16);
		text = `${text.slice(0, dotted.index)}${high}:${low}`;
	}

	const [head, tail] = text.includes('::') ? text.split('::') : [text, undefined];
	const headParts = head ? head.split(':') : [];
	const tailParts = tail ? tail.split(':') : [];
	const missing = tail === undefined ? 0 : 8 - headParts.length - tailParts.length;

	const hextets = [...headParts, ...Array<string>(missing).fill('0'), ...tailParts].map((part) =>
		parseInt(part, 16),
	);
	return hextets.length === 8 && hextets.every((h) => h >= 0 && h <= 0xffff) ? hextets : null;
}

/** Canonical, uncompressed IPv6 text (lower-case hextets without leading zeros). */
export function normalizeIpv6(address: string): string | null {
	const hextets = expandIpv6(address);
	return hextets ? hextets.map((h) => h.toString(16)).join(':') : null;
}

/** Returns the embedded IPv4 address of an IPv4-mapped IPv6 literal (::ffff:a.b.c.d). */
export function mappedIpv4(address: string): string | null {
	const hextets = expandIpv6(address);
	if (!hextets) return null;
	const isMapped = hextets.slice(0, 5).every((h) => h === 0) && hextets[5] === 0xffff;
	if (!isMapped) return null;
	return [hextets[6] >> 8, hextets[6] & 0xff, hextets[7] >> 8, hextets[7] & 0xff].join('.');
}

export function ipFamily(address: string): IpFamily | null {
	const bare = unbracket(address);
	if (isIPv4(bare)) return 'ipv4';
	if (isIP(bare.split('%')[0]) === 6) return 'ipv6';
	return null;
}

/**
 * Classifies an IP literal against the reserved IPv4/IPv6 tables and the
 * cloud metadata endpoints. Anything that does not parse as an IP is
 * treated as reserved.
 */
export function classifyIp(address: string): IpClassification {
	const bare = unbracket(address).split('%')[0];
	const family = ipFamily(bare);

	if (!family) {
		return { reserved: true, reason: `invalid IP address: ${address}` };
	}

	const canonical = family === 'ipv6' ? (normalizeIpv6(bare) ?? bare) : bare;
	if (METADATA_ADDRESSES.has(canonical)) {
		return { reserved: true, reason: `cloud metadata endpoint ${bare}` };
	}

	if (family === 'ipv4') {
		for (const r of RESERVED_IPV4) {
			if (r.list.check(bare, 'ipv4')) {
				return { reserved: true, reason: `reserved IPv4 address ${bare} (${r.label}, ${r.cidr})` };
			}
		}
		return { reserved: false, reason: '' };
	}

	const embedded = mappedIpv4(bare);
	if (embedded) {
		const inner = classifyIp(embedded);
		if (inner.reserved) {
			return { reserved: true, reason: `IPv4-mapped IPv6 address ${bare} embeds ${inner.reason}` };
		}
	}

	for (const r of RESERVED_IPV6) {
		if (r.list.check(bare, 'ipv6')) {
			return { reserved: true, reason: `reserved IPv6 address ${bare} (${r.label}, ${r.cidr})` };
		}
	}
	return { reserved: false, reason: '' };
}
