// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { isPathPrefix } from '../../mappers/commandPath';
import { EthernetInterfaceMapper } from '../../mappers/interfaces/ethernet';
import { UnsupportedFeatureError } from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  getLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe('EthernetInterfaceMapper paths', () => {
  const mapper = new EthernetInterfaceMapper('1.5');

  it('should root every path at the interface', () => {
    expect(mapper.getInterface('eth0')).toEqual(['interfaces', 'ethernet', 'eth0']);
  });

  it('should be deterministic', () => {
    expect(mapper.getMtu('eth0', '9000')).toEqual(mapper.getMtu('eth0', '9000'));
    expect(new EthernetInterfaceMapper('1.5').getSpeed('eth1', '1000')).toEqual(
      mapper.getSpeed('eth1', '1000'),
    );
  });

  it('should build physical link paths', () => {
    expect(mapper.getDuplex('eth0', 'full')).toEqual(['interfaces', 'ethernet', 'eth0', 'duplex', 'full']);
    expect(mapper.getHwId('eth0', '00:50:56:aa:bb:cc')).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'hw-id',
      '00:50:56:aa:bb:cc',
    ]);
    expect(mapper.getOffload('eth0', 'gro')).toEqual(['interfaces', 'ethernet', 'eth0', 'offload', 'gro']);
    expect(mapper.getRingBuffer('eth0', 'rx', '512')).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'ring-buffer',
      'rx',
      '512',
    ]);
  });

  it('should make each property path a strict prefix of its value path', () => {
    const pairs = [
      [mapper.getDescriptionPath('eth0'), mapper.getDescription('eth0', 'uplink')],
      [mapper.getMtuPath('eth0'), mapper.getMtu('eth0', '1500')],
      [mapper.getVrfPath('eth0'), mapper.getVrf('eth0', 'MGMT')],
      [mapper.getDuplexPath('eth0'), mapper.getDuplex('eth0', 'auto')],
      [mapper.getSpeedPath('eth0'), mapper.getSpeed('eth0', 'auto')],
      [mapper.getIpAdjustMssPath('eth0'), mapper.getIpAdjustMss('eth0', '1400')],
      [mapper.getDhcpOptionPath('eth0', 'host-name'), mapper.getDhcpOption('eth0', 'host-name', 'r1')],
      [mapper.getVifMtuPath('eth0', '100'), mapper.getVifMtu('eth0', '100', '1500')],
      [
        mapper.getVifCDescriptionPath('eth0', '100', '200'),
        mapper.getVifCDescription('eth0', '100', '200', 'customer'),
      ],
      [mapper.getMirrorPath('eth0', 'ingress'), mapper.getMirror('eth0', 'ingress', 'eth1')],
    ];

    for (const [propertyPath, valuePath] of pairs) {
      expect(isPathPrefix(propertyPath, valuePath)).toBe(true);
      expect(valuePath).toHaveLength(propertyPath.length + 1);
    }
  });

  it('should nest the customer VLAN under the service VLAN', () => {
    expect(mapper.getVifCAddress('eth0', '100', '200', '10.1.1.1/30')).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'vif-s',
      '100',
      'vif-c',
      '200',
      'address',
      '10.1.1.1/30',
    ]);
  });

  it('should place ipv6 address options under the address node', () => {
    expect(mapper.getIpv6AddressEui64('eth0', '2001:db8::/64')).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'ipv6',
      'address',
      'eui64',
      '2001:db8::/64',
    ]);
  });
});

describe('enable-directed-broadcast', () => {
  it('should return the path on 1.5', () => {
    expect(new EthernetInterfaceMapper('1.5').getIpEnableDirectedBroadcast('eth0')).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'ip',
      'enable-directed-broadcast',
    ]);
  });

  it('should throw on 1.4', () => {
    const mapper = new EthernetInterfaceMapper('1.4');
    expect(() => mapper.getIpEnableDirectedBroadcast('eth0')).toThrow(UnsupportedFeatureError);
    expect(() => mapper.getIpEnableDirectedBroadcast('eth0')).toThrow(
      'enable-directed-broadcast requires VyOS 1.5+. Current device is running v1.4',
    );
  });

  it('should keep other ip paths on 1.4', () => {
    expect(new EthernetInterfaceMapper('1.4').getIpFlag('eth0', 'enable-proxy-arp')).toEqual([
      'interfaces',
      'ethernet',
      'eth0',
      'ip',
      'enable-proxy-arp',
    ]);
  });

  it('should treat unknown versions as the latest', () => {
    const mapper = new EthernetInterfaceMapper('2.0');
    expect(mapper.version).toBe('2.0');
    expect(mapper.getIpEnableDirectedBroadcast('eth0')).toHaveLength(5);
  });

  it('should not leak overrides between instances', () => {
    new EthernetInterfaceMapper('1.4');
    expect(new EthernetInterfaceMapper('1.5').getIpEnableDirectedBroadcast('eth0')).toHaveLength(5);
  });
});

describe('EthernetInterfaceMapper.parseSingleInterface', () => {
  const raw = {
    address: ['10.0.0.1/24', 'dhcp'],
    description: 'WAN',
    'hw-id': '00:50:56:aa:bb:cc',
    speed: 'auto',
    duplex: 'auto',
    'disable-flow-control': {},
    ip: { 'enable-directed-broadcast': {}, 'adjust-mss': '1452' },
    'ring-buffer': { rx: '512' },
    vif: { '100': { address: '10.1.1.1/24' } },
  };

  it('should parse every attribute of a 1.5 interface', () => {
    const record = new EthernetInterfaceMapper('1.5').parseSingleInterface('eth0', raw);

    expect(record.name).toBe('eth0');
    expect(record.type).toBe('ethernet');
    expect(record.addresses).toEqual(['10.0.0.1/24', 'dhcp']);
    expect(record.hwId).toBe('00:50:56:aa:bb:cc');
    expect(record.mac).toBeNull();
    expect(record.disableFlowControl).toBe(true);
    expect(record.disableLinkDetect).toBeNull();
    expect(record.ringBuffer).toEqual({ rx: '512', tx: null });
    expect(record.ip?.adjustMss).toBe('1452');
    expect(record.ip?.enableDirectedBroadcast).toBe(true);
    expect(record.vif?.[0].addresses).toEqual(['10.1.1.1/24']);
    expect(record.vifS).toBeNull();
    expect(record.offload).toBeNull();
    expect(record.evpn).toBeNull();
  });

  it('should report directed broadcast as null on 1.4', () => {
    const record = new EthernetInterfaceMapper('1.4').parseSingleInterface('eth0', raw);
    expect(record.ip?.enableDirectedBroadcast).toBeNull();
    expect(record.ip?.adjustMss).toBe('1452');
  });

  it('should keep ip null on 1.4 when the block is absent', () => {
    expect(new EthernetInterfaceMapper('1.4').parseSingleInterface('eth0', {}).ip).toBeNull();
  });

  it('should summarize an ethernet subtree', () => {
    const summary = new EthernetInterfaceMapper('1.5').parseInterfacesOfType({
      eth0: { vrf: 'MGMT' },
      eth1: {},
    });
    expect(summary.total).toBe(2);
    expect(summary.byType).toEqual({ ethernet: 2 });
    expect(summary.byVrf).toEqual({ MGMT: 1 });
  });
});
