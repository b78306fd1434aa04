/**
 * Tests for the lsblk parser
 */

import { describe, it, expect } from '@jest/globals';
import { decodeLsblkValue, parseBlockDevices, partitionNumber, partitionRole } from './lsblk.js';
import { loadFixture } from '../__tests__/utils.js';
import type { BlockDeviceRecord } from '../types/storage.js';

function device(overrides: Partial<BlockDeviceRecord>): BlockDeviceRecord {
  return {
    name: 'sda1',
    path: '/dev/sda1',
    parent: 'sda',
    sizeBytes: 1024,
    kind: 'part',
    tableType: 'gpt',
    partitionTypeCode: null,
    partitionType: null,
    fsType: null,
    label: null,
    mountPoint: null,
    ...overrides,
  };
}

describe('parseBlockDevices', () => {
  it('should parse the fixture host and drop repeated devices', () => {
    const result = parseBlockDevices(loadFixture('host', 'lsblk.txt'));

    expect(result.skipped).toBe(0);
    expect(result.records).toHaveLength(13);
    expect(result.records.filter(r => r.name === 'vg_data-lv--home')).toHaveLength(1);
    expect(result.records.map(r => r.name).slice(0, 3)).toEqual(['loop0', 'sda', 'sda1']);
  });

  it('should map columns and turn empty values into null', () => {
    const result = parseBlockDevices(loadFixture('host', 'lsblk.txt'));
    const efi = result.records.find(r => r.name === 'sda1');
    const disk = result.records.find(r => r.name === 'sda');

    expect(efi).toEqual({
      name: 'sda1',
      path: '/dev/sda1',
      parent: 'sda',
      sizeBytes: 536870912,
      kind: 'part',
      tableType: 'gpt',
      partitionTypeCode: 'c12a7328-f81f-11d2-ba4b-00a0c93ec93b',
      partitionType: 'EFI System',
      fsType: 'vfat',
      label: 'EFI',
      mountPoint: '/boot/efi',
    });
    expect(disk?.parent).toBeNull();
    expect(disk?.mountPoint).toBeNull();
  });

  it('should decode escaped characters in values', () => {
    const result = parseBlockDevices(loadFixture('host', 'lsblk.txt'));
    const home = result.records.find(r => r.name === 'vg_data-lv--home');

    expect(home?.label).toBe('home data');
  });

  it('should accept output without the PARTTYPENAME column', () => {
    const line =
      'NAME="sdb1" PATH="/dev/sdb1" PKNAME="sdb" SIZE="1048576" TYPE="part" PTTYPE="gpt" PARTTYPE="" FSTYPE="" LABEL="" MOUNTPOINT=""';

    const result = parseBlockDevices(line);

    expect(result.skipped).toBe(0);
    expect(result.records[0]?.partitionType).toBeNull();
  });

  it('should skip and count lines missing a required column', () => {
    const text = [
      'NAME="sda" PATH="/dev/sda" PKNAME="" SIZE="1024" TYPE="disk" PTTYPE="" PARTTYPE="" PARTTYPENAME="" FSTYPE="" LABEL="" MOUNTPOINT=""',
      'NAME="sdb" SIZE="1024" TYPE="disk"',
      'garbage',
    ].join('\n');

    const result = parseBlockDevices(text);

    expect(result.records).toHaveLength(1);
    expect(result.skipped).toBe(2);
    expect(result.issues[0]).toEqual({ line: 2, message: 'lsblk: missing field PATH' });
    expect(result.issues[1]).toEqual({ line: 3, message: 'lsblk: missing field NAME' });
  });

  it('should keep a record with an unreadable size as null', () => {
    const line =
      'NAME="sr0" PATH="/dev/sr0" PKNAME="" SIZE="" TYPE="rom" PTTYPE="" PARTTYPE="" PARTTYPENAME="" FSTYPE="" LABEL="" MOUNTPOINT=""';

    const result = parseBlockDevices(line);

    expect(result.records[0]?.sizeBytes).toBeNull();
  });
});

describe('decodeLsblkValue', () => {
  it('should decode hex escapes', () => {
    expect(decodeLsblkValue('my\\x20disk\\x22')).toBe('my disk"');
    expect(decodeLsblkValue('plain')).toBe('plain');
  });

  it('should decode escaped UTF-8 byte runs as one character', () => {
    expect(decodeLsblkValue('donn\\xc3\\xa9es')).toBe('données');
    expect(decodeLsblkValue('\\xe6\\x95\\xb0\\x20x')).toBe('数 x');
  });
});

describe('partitionRole', () => {
  it('should identify disks and non-partition devices', () => {
    expect(partitionRole(device({ kind: 'disk', tableType: 'dos' }))).toBe('Disk');
    expect(partitionRole(device({ kind: 'lvm', tableType: null }))).toBe('---');
    expect(partitionRole(device({ kind: 'loop', tableType: null }))).toBe('---');
  });

  it('should distinguish DOS extended and logical partitions', () => {
    expect(partitionRole(device({ name: 'sda2', tableType: 'dos', partitionTypeCode: '0x5' }))).toBe('Extd');
    expect(partitionRole(device({ name: 'sda2', tableType: 'dos', partitionTypeCode: '0xF' }))).toBe('Extd');
    expect(partitionRole(device({ name: 'sda5', tableType: 'dos', partitionTypeCode: '0x83' }))).toBe('Logi');
    expect(partitionRole(device({ name: 'sda1', tableType: 'dos', partitionTypeCode: '0x83' }))).toBe('Pri');
  });

  it('should treat every GPT partition as primary', () => {
    expect(partitionRole(device({ name: 'nvme0n1p7', tableType: 'gpt' }))).toBe('Pri');
  });
});

describe('partitionNumber', () => {
  it('should read the trailing number of a kernel name', () => {
    expect(partitionNumber('sda3')).toBe(3);
    expect(partitionNumber('nvme0n1p12')).toBe(12);
    expect(partitionNumber('sda')).toBeNull();
  });
});
