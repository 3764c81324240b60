// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { ConfigTree } from '../../parsers/configTree';
import { parseCommonFields } from '../../parsers/interfaceParser';
import { DummyInterfaceRecord } from '../../parsers/types';
import { InterfaceMapper } from './interfaceMapper';

/**
 * Dummy (virtual) interfaces. Their schema is the same on every supported
 * version and has no physical-link properties (speed, duplex, hw-id, ...).
 */
export class DummyInterfaceMapper extends InterfaceMapper<DummyInterfaceRecord> {
  constructor(version: string) {
    super(version, 'dummy');
  }

  parseSingleInterface(name: string, config: ConfigTree): DummyInterfaceRecord {
    return parseCommonFields(name, this.interfaceType, config);
  }
}
