import type {
  AdapterCapabilityName,
  BridgeCapabilityName,
  CapabilityContract,
  CapabilityName,
  CapabilityUnavailable,
  ContractTable,
  ImplementationFor,
  ImplementationTable,
  OperatingSystem,
  ParseResult,
} from '@hostbridge/types';
import { BridgeError, DuplicateCapabilityError, logger } from '@hostbridge/utils';

/**
 * A validated call, bound to its implementation and ready to run.
 */
export type PreparedCall =
  | {
      mode: 'oneShot';
      /** `null` runs without a timer; `undefined` falls back to the bridge default. */
      timeoutMs: number | null | undefined;
      run: () => Promise<unknown>;
    }
  | {
      mode: 'watch';
      start: (onEvent: (event: unknown) => void, onError: (error: unknown) => void) => () => void;
    }
  | { mode: 'unavailable' };

/** The parts of a contract the dispatcher reads once a call is bound. */
export type ContractSummary = Pick<
  CapabilityContract,
  'name' | 'mode' | 'requiredPermission' | 'platformSupport' | 'resultShape'
>;

export interface RegistryEntry {
  readonly contract: ContractSummary;
  /** False when the contract excludes this OS or the adapter offers nothing. */
  readonly available: boolean;
  /** Validates arguments first; an unavailable capability prepares to `{ mode: 'unavailable' }`. */
  readonly prepare: (raw: unknown) => ParseResult<PreparedCall>;
}

function bind<K extends CapabilityName>(
  contract: CapabilityContract<K>,
  implementation: ImplementationFor<K> | CapabilityUnavailable,
  supported: boolean,
): RegistryEntry['prepare'] {
  return (raw) => {
    const parsed = contract.parseArgs(raw);
    if (!parsed.ok) {
      return parsed;
    }
    const args = parsed.value;

    if (!supported || !implementation.isAvailable) {
      return { ok: true, value: { mode: 'unavailable' } };
    }
    if (implementation.mode === 'watch') {
      const watch = implementation;
      return {
        ok: true,
        value: {
          mode: 'watch',
          start: (onEvent, onError) => watch.subscribe(args, onEvent, onError),
        },
      };
    }
    const oneShot = implementation;
    return {
      ok: true,
      value: {
        mode: 'oneShot',
        timeoutMs: contract.timeoutFor?.(args),
        run: () => oneShot.invoke(args),
      },
    };
  };
}

/**
 * Capability lookup for one bridge instance. Filled once at construction and frozen;
 * lookups never mutate it.
 */
export class CapabilityRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private frozen = false;

  constructor(private readonly os: OperatingSystem) {}

  register<K extends CapabilityName>(
    contract: CapabilityContract<K>,
    implementation: ImplementationFor<K> | CapabilityUnavailable,
  ): void {
    if (this.frozen) {
      throw new Error(`[CapabilityRegistry] Cannot register ${contract.name} after construction`);
    }
    if (this.entries.has(contract.name)) {
      throw new DuplicateCapabilityError(contract.name);
    }

    const supported = contract.platformSupport.has(this.os);
    if (supported && !implementation.isAvailable) {
      logger.warn('[CapabilityRegistry] Adapter offers no implementation for a supported capability', {
        capability: contract.name,
        os: this.os,
      });
    }
    if (implementation.isAvailable && implementation.mode !== contract.mode) {
      throw new Error(
        `[CapabilityRegistry] ${contract.name} is declared ${contract.mode} but implemented as ${implementation.mode}`,
      );
    }

    const available = supported && implementation.isAvailable;
    this.entries.set(contract.name, {
      contract,
      available,
      prepare: bind(contract, implementation, supported),
    });
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  /** Returns the entry for `name`, or throws an UnknownCapability BridgeError. */
  resolve(name: string): RegistryEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new BridgeError('UnknownCapability', `Unknown capability: ${name}`);
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}

function registerFrom<K extends CapabilityName>(
  registry: CapabilityRegistry,
  name: K,
  contracts: ContractTable,
  implementations: ImplementationTable,
): void {
  registry.register(contracts[name], implementations[name]);
}

/**
 * Builds the frozen registry for one bridge: every contract bound to the adapter's
 * implementation or, for bridge-owned capabilities, to the bridge's own.
 */
export function buildRegistry(
  os: OperatingSystem,
  contracts: ContractTable,
  adapterCapabilities: ImplementationTable<AdapterCapabilityName>,
  bridgeCapabilities: ImplementationTable<BridgeCapabilityName>,
): CapabilityRegistry {
  const registry = new CapabilityRegistry(os);
  const implementations: ImplementationTable = { ...adapterCapabilities, ...bridgeCapabilities };
  for (const name of Object.keys(contracts)) {
    if (isKeyOf(contracts, name)) {
      registerFrom(registry, name, contracts, implementations);
    }
  }
  return registry.freeze();
}

function isKeyOf(contracts: ContractTable, name: string): name is CapabilityName {
  return Object.prototype.hasOwnProperty.call(contracts, name);
}
