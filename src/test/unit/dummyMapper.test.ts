// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { DummyInterfaceMapper } from '../../mappers/interfaces/dummy';

describe('DummyInterfaceMapper', () => {
  const mapper = new DummyInterfaceMapper('1.4');

  it('should root paths at interfaces dummy', () => {
    expect(mapper.getAddress('dum0', '10.255.0.1/32')).toEqual([
      'interfaces',
      'dummy',
      'dum0',
      'address',
      '10.255.0.1/32',
    ]);
    expect(mapper.getDisable('dum0')).toEqual(['interfaces', 'dummy', 'dum0', 'disable']);
  });

  it('should expose the family name', () => {
    expect(mapper.family).toBe('interface_dummy');
    expect(mapper.interfaceType).toBe('dummy');
  });

  it('should have no physical link paths', () => {
    expect('getSpeed' in mapper).toBe(false);
    expect('getDuplex' in mapper).toBe(false);
  });

  it('should parse common fields only', () => {
    const summary = mapper.parseInterfacesOfType({
      dum0: { address: '10.255.0.1/32', description: 'router-id', vrf: 'MGMT' },
      dum1: { disable: {} },
    });

    expect(summary.interfaces).toEqual([
      {
        name: 'dum0',
        type: 'dummy',
        addresses: ['10.255.0.1/32'],
        description: 'router-id',
        vrf: 'MGMT',
        mtu: null,
        disable: null,
      },
      {
        name: 'dum1',
        type: 'dummy',
        addresses: [],
        description: null,
        vrf: null,
        mtu: null,
        disable: true,
      },
    ]);
    expect(summary.byVrf).toEqual({ MGMT: 1 });
  });
});
