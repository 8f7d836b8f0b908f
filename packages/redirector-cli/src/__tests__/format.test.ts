import { describe, it, expect } from 'vitest';
import { createInstanceNet } from 'redirector-wire';
import { formatBytes, formatInstanceDetails, parseCount, parsePort, describeError } from '../format.js';

describe('formatInstanceDetails', () => {
  it('describes an address instance', () => {
    const details = { net: createInstanceNet('10.0.0.5', 42127), secure: true };
    expect(formatInstanceDetails(details)).toBe('10.0.0.5:42127 (address, secure)');
  });

  it('describes a hostname instance', () => {
    const details = { net: createInstanceNet('relay.example.net', 80), secure: false };
    expect(formatInstanceDetails(details)).toBe('relay.example.net:80 (hostname, insecure)');
  });
});

describe('formatBytes', () => {
  it('prints hex or base64', () => {
    const bytes = Uint8Array.of(0xc2, 0xfc, 0xb4);
    expect(formatBytes(bytes, 'hex')).toBe('c2fcb4');
    expect(formatBytes(bytes, 'base64')).toBe('wvy0');
  });
});

describe('parsePort', () => {
  it('accepts every u16 value', () => {
    expect(parsePort('0')).toBe(0);
    expect(parsePort('42127')).toBe(42127);
    expect(parsePort('65535')).toBe(65535);
  });

  it('rejects anything else', () => {
    expect(parsePort('65536')).toBeUndefined();
    expect(parsePort('-1')).toBeUndefined();
    expect(parsePort('80a')).toBeUndefined();
    expect(parsePort('')).toBeUndefined();
  });
});

describe('parseCount', () => {
  it('accepts plain decimal integers', () => {
    expect(parseCount('0')).toBe(0);
    expect(parseCount('16777216')).toBe(16777216);
  });

  it('rejects trailing garbage and signs', () => {
    expect(parseCount('12abc')).toBeUndefined();
    expect(parseCount('-1')).toBeUndefined();
    expect(parseCount('1e3')).toBeUndefined();
    expect(parseCount('')).toBeUndefined();
    expect(parseCount('99999999999999999999')).toBeUndefined();
  });
});

describe('describeError', () => {
  it('uses the error message', () => {
    expect(describeError(new Error('Missing tag ADDR (Union)'))).toBe('Missing tag ADDR (Union)');
    expect(describeError('plain')).toBe('plain');
  });
});
