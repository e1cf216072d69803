import { describe, it, expect } from 'vitest';
import { InvalidAddressError } from '@fleetmon/shared';
import {
  parseIPv4,
  isValidIPv4,
  deriveSocId,
  deriveBoardId,
  deriveIdentity,
  boardIdForSocId,
} from '../identity/IdentityDeriver.js';

describe('IdentityDeriver', () => {
  describe('parseIPv4', () => {
    it('should parse four decimal octets', () => {
      expect(parseIPv4('10.0.0.201')).toEqual([10, 0, 0, 201]);
      expect(parseIPv4('0.0.0.0')).toEqual([0, 0, 0, 0]);
      expect(parseIPv4('255.255.255.255')).toEqual([255, 255, 255, 255]);
    });

    it.each([
      ['999.1.1.1'],
      ['1.2.3'],
      ['1.2.3.4.5'],
      ['01.2.3.4'],
      ['1.2.3.256'],
      ['1.2.3.-1'],
      ['a.b.c.d'],
      ['1..2.3'],
      [' 1.2.3.4'],
      [''],
    ])('should reject %j', (address) => {
      expect(() => parseIPv4(address)).toThrow(InvalidAddressError);
    });

    it('should report the offending address in the error', () => {
      expect(() => parseIPv4('not-an-ip')).toThrow('Invalid IPv4 address: not-an-ip');
    });
  });

  describe('deriveSocId', () => {
    it('should band the last octet by tens', () => {
      expect(deriveSocId('10.0.0.201')).toBe('10.0.0.200');
      expect(deriveSocId('10.0.0.209')).toBe('10.0.0.200');
      expect(deriveSocId('10.0.0.210')).toBe('10.0.0.210');
      expect(deriveSocId('10.0.0.219')).toBe('10.0.0.210');
      expect(deriveSocId('10.0.0.255')).toBe('10.0.0.250');
      expect(deriveSocId('192.168.4.7')).toBe('192.168.4.0');
    });

    it('should keep the first three octets', () => {
      expect(deriveSocId('172.16.30.45')).toBe('172.16.30.40');
    });
  });

  describe('deriveBoardId', () => {
    it('should band the last octet by hundreds', () => {
      expect(deriveBoardId('10.0.0.201')).toBe('10.0.0.200');
      expect(deriveBoardId('10.0.0.255')).toBe('10.0.0.200');
      expect(deriveBoardId('10.0.0.199')).toBe('10.0.0.100');
      expect(deriveBoardId('10.0.0.99')).toBe('10.0.0.0');
    });
  });

  describe('deriveIdentity', () => {
    it('should derive both group ids at once', () => {
      expect(deriveIdentity('10.0.0.215')).toEqual({
        socId: '10.0.0.210',
        boardId: '10.0.0.200',
      });
    });

    it('should throw for invalid input', () => {
      expect(() => deriveIdentity('10.0.0')).toThrow(InvalidAddressError);
    });
  });

  describe('boardIdForSocId', () => {
    it('should agree with the board of every address in the SoC band', () => {
      for (let last = 0; last <= 255; last++) {
        const address = `10.1.2.${last}`;
        expect(boardIdForSocId(deriveSocId(address))).toBe(deriveBoardId(address));
      }
    });
  });

  describe('isValidIPv4', () => {
    it('should return true for a valid address', () => {
      expect(isValidIPv4('10.0.0.1')).toBe(true);
    });

    it('should return false for an invalid address', () => {
      expect(isValidIPv4('10.0.0.300')).toBe(false);
    });
  });
});
