// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

import { DummyInterfaceMapper } from '../mappers/interfaces/dummy';
import { InterfaceBatchBuilder } from './interfaceBatch';

/**
 * Dummy interfaces only take the common interface operations
 */
export class DummyBatchBuilder extends InterfaceBatchBuilder<DummyInterfaceMapper> {}
