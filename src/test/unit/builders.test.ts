// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { BatchBuilder } from '../../builders/batchBuilder';
import { DummyBatchBuilder } from '../../builders/dummyBatch';
import { EthernetBatchBuilder } from '../../builders/ethernetBatch';
import { RawBatchBuilder } from '../../builders/rawBatch';
import { DummyInterfaceMapper } from '../../mappers/interfaces/dummy';
import { EthernetInterfaceMapper } from '../../mappers/interfaces/ethernet';
import {
  BatchConsumedError,
  BatchInFlightError,
  InvalidRequestError,
  UnsupportedFeatureError,
} from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  getLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe('BatchBuilder', () => {
  it('should keep insertion order', () => {
    const batch = new BatchBuilder()
      .addSet(['interfaces', 'dummy', 'dum0'])
      .addDelete(['interfaces', 'dummy', 'dum1']);

    expect(batch.getOperations()).toEqual([
      { op: 'set', path: ['interfaces', 'dummy', 'dum0'] },
      { op: 'delete', path: ['interfaces', 'dummy', 'dum1'] },
    ]);
  });

  it('should not deduplicate', () => {
    const path = ['system', 'host-name', 'r1'];
    expect(new BatchBuilder().addSet(path).addSet(path).operationCount()).toBe(2);
  });

  it('should append multiple sets', () => {
    const batch = new BatchBuilder().addMultipleSets([['a'], ['b'], ['c']]);
    expect(batch.getOperations().map((operation) => operation.path[0])).toEqual(['a', 'b', 'c']);
  });

  it('should return a copy of the operations', () => {
    const batch = new BatchBuilder().addSet(['a']);
    const operations = batch.getOperations();
    operations.pop();
    expect(batch.operationCount()).toBe(1);
  });

  it('should report empty and clear', () => {
    const batch = new BatchBuilder();
    expect(batch.isEmpty()).toBe(true);
    batch.addSet(['a']);
    expect(batch.isEmpty()).toBe(false);
    batch.clear();
    expect(batch.isEmpty()).toBe(true);
    expect(batch.operationCount()).toBe(0);
  });

  it('should refuse appends after execution until cleared', () => {
    const batch = new BatchBuilder().addSet(['a']);
    batch.markExecuted();

    expect(batch.isConsumed).toBe(true);
    expect(() => batch.addSet(['b'])).toThrow(BatchConsumedError);
    expect(() => batch.assertExecutable()).toThrow(BatchConsumedError);

    batch.clear();
    expect(batch.isConsumed).toBe(false);
    expect(batch.addSet(['b']).operationCount()).toBe(1);
  });

  it('should keep queued paths independent of the caller array', () => {
    const path = ['system', 'host-name', 'r1'];
    const batch = new BatchBuilder().addSet(path);

    path[2] = 'r2';

    expect(batch.getOperations()[0].path).toEqual(['system', 'host-name', 'r1']);
  });

  it('should lock the batch while a submission is pending', () => {
    const batch = new BatchBuilder().addSet(['a']);
    batch.beginExecution();

    expect(batch.isInFlight).toBe(true);
    expect(() => batch.beginExecution()).toThrow(BatchInFlightError);
    expect(() => batch.addSet(['b'])).toThrow(BatchInFlightError);
    expect(() => batch.clear()).toThrow(BatchInFlightError);

    batch.abortExecution();
    expect(batch.isInFlight).toBe(false);
    expect(batch.addSet(['b']).operationCount()).toBe(2);
  });

  it('should release the lock when the submission succeeds', () => {
    const batch = new BatchBuilder().addSet(['a']);
    batch.beginExecution();
    batch.markExecuted();

    expect(batch.isInFlight).toBe(false);
    expect(() => batch.beginExecution()).toThrow(BatchConsumedError);
  });
});

describe('EthernetBatchBuilder', () => {
  const base = ['interfaces', 'ethernet', 'eth0'];

  it('should queue vif then vif address in call order', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5'))
      .setVif('eth0', '100')
      .setVifAddress('eth0', '100', '10.1.1.1/24');

    expect(batch.getOperations()).toEqual([
      { op: 'set', path: [...base, 'vif', '100'] },
      { op: 'set', path: [...base, 'vif', '100', 'address', '10.1.1.1/24'] },
    ]);
  });

  it('should use property paths for scalar deletes', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5'))
      .deleteInterfaceMtu('eth0')
      .deleteSpeed('eth0')
      .deleteRingBuffer('eth0', 'tx')
      .deleteDhcpOption('eth0', 'client-id');

    expect(batch.getOperations()).toEqual([
      { op: 'delete', path: [...base, 'mtu'] },
      { op: 'delete', path: [...base, 'speed'] },
      { op: 'delete', path: [...base, 'ring-buffer', 'tx'] },
      { op: 'delete', path: [...base, 'dhcp-options', 'client-id'] },
    ]);
  });

  it('should delete one address among many by value', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5')).deleteInterfaceAddress(
      'eth0',
      '10.0.0.1/24',
    );
    expect(batch.getOperations()).toEqual([
      { op: 'delete', path: [...base, 'address', '10.0.0.1/24'] },
    ]);
  });

  it('should enable by deleting the disable flag', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5'))
      .setInterfaceDisable('eth0')
      .deleteInterfaceDisable('eth0');
    expect(batch.getOperations()).toEqual([
      { op: 'set', path: [...base, 'disable'] },
      { op: 'delete', path: [...base, 'disable'] },
    ]);
  });

  it('should delete the vrf binding with or without its value', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5'))
      .deleteInterfaceVrf('eth0')
      .deleteInterfaceVrf('eth0', 'MGMT');
    expect(batch.getOperations()).toEqual([
      { op: 'delete', path: [...base, 'vrf'] },
      { op: 'delete', path: [...base, 'vrf', 'MGMT'] },
    ]);
  });

  it('should build QinQ operations', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5'))
      .setVifS('eth0', '100')
      .setVifSProtocol('eth0', '100', '802.1ad')
      .setVifC('eth0', '100', '200')
      .setVifCAddress('eth0', '100', '200', '10.1.1.1/30');

    expect(batch.getOperations().map((operation) => operation.path.slice(3))).toEqual([
      ['vif-s', '100'],
      ['vif-s', '100', 'protocol', '802.1ad'],
      ['vif-s', '100', 'vif-c', '200'],
      ['vif-s', '100', 'vif-c', '200', 'address', '10.1.1.1/30'],
    ]);
  });

  it('should queue directed broadcast on 1.5', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.5')).setIpEnableDirectedBroadcast(
      'eth0',
    );
    expect(batch.getOperations()).toEqual([
      { op: 'set', path: [...base, 'ip', 'enable-directed-broadcast'] },
    ]);
  });

  it('should reject directed broadcast on 1.4 without queuing', () => {
    const batch = new EthernetBatchBuilder(new EthernetInterfaceMapper('1.4')).setInterfaceMtu('eth0', '1500');

    expect(() => batch.setIpEnableDirectedBroadcast('eth0')).toThrow(UnsupportedFeatureError);
    expect(batch.operationCount()).toBe(1);
  });

  it('should expose the bound version', () => {
    expect(new EthernetBatchBuilder(new EthernetInterfaceMapper('1.4')).version).toBe('1.4');
  });
});

describe('DummyBatchBuilder', () => {
  it('should build common interface operations', () => {
    const batch = new DummyBatchBuilder(new DummyInterfaceMapper('1.5'))
      .setInterfaceAddress('dum0', '10.255.0.1/32')
      .setInterfaceDescription('dum0', 'router-id');

    expect(batch.getOperations()).toEqual([
      { op: 'set', path: ['interfaces', 'dummy', 'dum0', 'address', '10.255.0.1/32'] },
      { op: 'set', path: ['interfaces', 'dummy', 'dum0', 'description', 'router-id'] },
    ]);
  });

  it('should not offer physical link operations', () => {
    const batch = new DummyBatchBuilder(new DummyInterfaceMapper('1.5'));
    expect('setSpeed' in batch).toBe(false);
    expect('setDuplex' in batch).toBe(false);
  });
});

describe('RawBatchBuilder', () => {
  it('should accept a path with no mapper method', () => {
    const batch = new RawBatchBuilder().addSet(['interfaces', 'dummy', 'dum0', 'speed', '1000']);
    expect(batch.getOperations()).toEqual([
      { op: 'set', path: ['interfaces', 'dummy', 'dum0', 'speed', '1000'] },
    ]);
  });

  it('should append validated operations', () => {
    const batch = new RawBatchBuilder().addOperations([
      { op: 'set', path: ['system', 'host-name', 'r1'] },
      { op: 'delete', path: ['service', 'ssh'] },
    ]);
    expect(batch.getOperations()).toEqual([
      { op: 'set', path: ['system', 'host-name', 'r1'] },
      { op: 'delete', path: ['service', 'ssh'] },
    ]);
  });

  it('should not follow later changes to the submitted records', () => {
    const operations = [{ op: 'set', path: ['system', 'host-name', 'r1'] }];
    const batch = new RawBatchBuilder().addOperations(operations);

    operations[0].path[2] = 'r2';

    expect(batch.getOperations()).toEqual([{ op: 'set', path: ['system', 'host-name', 'r1'] }]);
  });

  it('should reject invalid operations and queue nothing', () => {
    const batch = new RawBatchBuilder();
    expect(() =>
      batch.addOperations([
        { op: 'set', path: ['system'] },
        { op: 'merge', path: ['system'] },
      ]),
    ).toThrow(InvalidRequestError);
    expect(batch.isEmpty()).toBe(true);
  });

  it('should reject an empty path', () => {
    expect(() => new RawBatchBuilder().addOperations([{ op: 'set', path: [] }])).toThrow(
      InvalidRequestError,
    );
  });
});
