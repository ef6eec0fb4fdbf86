import { describe, expect, test } from 'vitest';
import { classifyIp, expandIpv6, ipFamily, mappedIpv4, normalizeIpv6, unbracket } from './ip-ranges.js';

describe('expandIpv6', () => {
	test('expands compressed forms', () => {
		expect(expandIpv6('::1')).toEqual([0, 0, 0, 0, 0, 0, 0, 1]);
		expect(expandIpv6('::')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
		expect(expandIpv6('fe80::1:2')).toEqual([0xfe80, 0, 0, 0, 0, 0, 1, 2]);
	});

	test('folds a dotted IPv4 tail into two hextets', () => {
		expect(expandIpv6('::ffff:127.0.0.1')).toEqual([0, 0, 0, 0, 0, 0xffff, 0x7f00, 1]);
	});

	test('returns null for non-IPv6 input', () => {
		expect(expandIpv6('127.0.0.1')).toBeNull();
		expect(expandIpv6('example.com')).toBeNull();
	});

	test('normalizes to uncompressed lower-case text', () => {
		expect(normalizeIpv6('FD00:EC2::254')).toBe('fd00:ec2:0:0:0:0:0:254');
	});
});

describe('mappedIpv4', () => {
	test('extracts the embedded address', () => {
		expect(mappedIpv4('::ffff:7f00:1')).toBe('127.0.0.1');
		expect(mappedIpv4('[::ffff:10.1.2.3]')).toBe('10.1.2.3');
	});

	test('returns null for ordinary IPv6', () => {
		expect(mappedIpv4('2606:4700::1111')).toBeNull();
	});
});

describe('ipFamily', () => {
	test('detects both families and rejects hostnames', () => {
		expect(ipFamily('8.8.8.8')).toBe('ipv4');
		expect(ipFamily('[2001:4860::8888]')).toBe('ipv6');
		expect(ipFamily('example.com')).toBeNull();
	});

	test('unbracket leaves plain hosts alone', () => {
		expect(unbracket('[::1]')).toBe('::1');
		expect(unbracket('example.com')).toBe('example.com');
	});
});

describe('classifyIp', () => {
	test.each([
		'127.0.0.1',
		'10.20.30.40',
		'172.16.0.1',
		'172.31.255.254',
		'192.168.1.1',
		'169.254.1.1',
		'0.0.0.0',
		'100.64.0.1',
		'192.0.0.8',
		'192.0.2.1',
		'198.51.100.7',
		'203.0.113.9',
		'224.0.0.251',
		'240.0.0.1',
		'255.255.255.255',
	])('rejects reserved IPv4 %s', (address) => {
		expect(classifyIp(address).reserved).toBe(true);
	});

	test.each(['8.8.8.8', '1.1.1.1', '172.32.0.1', '100.128.0.1', '93.184.216.34'])(
		'accepts public IPv4 %s',
		(address) => {
			expect(classifyIp(address)).toEqual({ reserved: false, reason: '' });
		},
	);

	test.each(['::1', '::', 'fc00::1', 'fd12:3456::1', 'fe80::1', 'ff02::1', '100::1', '2001:db8::1', '2001::1'])(
		'rejects reserved IPv6 %s',
		(address) => {
			expect(classifyIp(address).reserved).toBe(true);
		},
	);

	test('accepts public IPv6', () => {
		expect(classifyIp('2606:4700:4700::1111').reserved).toBe(false);
	});

	test('names the metadata endpoints', () => {
		expect(classifyIp('169.254.169.254').reason).toBe('cloud metadata endpoint 169.254.169.254');
		expect(classifyIp('169.254.170.2').reason).toBe('cloud metadata endpoint 169.254.170.2');
		expect(classifyIp('fd00:ec2::254').reason).toBe('cloud metadata endpoint fd00:ec2::254');
	});

	test('reports the private IPv4 embedded in a mapped address', () => {
		const result = classifyIp('::ffff:7f00:1');
		expect(result.reserved).toBe(true);
		expect(result.reason).toBe(
			'IPv4-mapped IPv6 address ::ffff:7f00:1 embeds reserved IPv4 address 127.0.0.1 (loopback, 127.0.0.0/8)',
		);
	});

	test('rejects every mapped address, even with a public IPv4 inside', () => {
		const result = classifyIp('::ffff:8.8.8.8');
		expect(result.reserved).toBe(true);
		expect(result.reason).toContain('IPv4-mapped');
	});

	test('treats unparseable input as reserved', () => {
		expect(classifyIp('not-an-ip')).toEqual({ reserved: true, reason: 'invalid IP address: not-an-ip' });
	});
});
