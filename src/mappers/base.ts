// Copyright (c) 2026 Robin Mordasiewicz. MIT License.

/**
 * Translator from typed attributes to command paths for one feature-family,
 * bound to a device version. Holds no other state.
 */
export interface FeatureMapper {
  readonly family: string;
  readonly version: string;
}

export type MapperConstructor<M extends FeatureMapper> = new (version: string) => M;

/** Version-selecting factory */
export type MapperFactory<M extends FeatureMapper> = (version: string) => M;

export type MapperEntry<M extends FeatureMapper> =
  | { kind: 'class'; mapper: MapperConstructor<M> }
  | { kind: 'factory'; create: MapperFactory<M> };

export function fromClass<M extends FeatureMapper>(mapper: MapperConstructor<M>): MapperEntry<M> {
  return { kind: 'class', mapper };
}

export function fromFactory<M extends FeatureMapper>(create: MapperFactory<M>): MapperEntry<M> {
  return { kind: 'factory', create };
}

export function instantiate<M extends FeatureMapper>(entry: MapperEntry<M>, version: string): M {
  switch (entry.kind) {
    case 'class':
      return new entry.mapper(version);
    case 'factory':
      return entry.create(version);
  }
}

/**
 * Install version-specific method overrides on a mapper instance.
 * Own properties shadow the prototype, so methods without an override keep
 * the base behavior.
 */
export function installOverrides<T extends object>(target: T, overrides: Partial<T>): void {
  Object.assign(target, overrides);
}
