/**
 * Catálogo de bundles (somente leitura).
 *
 * As definições são imutáveis: o catálogo entrega cópias congeladas e
 * nunca aceita alteração depois de construído.
 */

import { GuidelineBundle } from '../entidades/tipos';
import { BundleNotFoundError, CatalogValidationError } from '../entidades/AdherenceErrors';

// ════════════════════════════════════════════════════════════════════════════
// INTERFACE
// ════════════════════════════════════════════════════════════════════════════

interface BundleCatalog {
  get(bundleId: string): GuidelineBundle | null;

  /**
   * @throws BundleNotFoundError
   */
  require(bundleId: string): GuidelineBundle;

  list(): GuidelineBundle[];
}

// ════════════════════════════════════════════════════════════════════════════
// IMPLEMENTAÇÃO EM MEMÓRIA
// ════════════════════════════════════════════════════════════════════════════

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  return value;
}

class InMemoryBundleCatalog implements BundleCatalog {
  private readonly bundles = new Map<string, GuidelineBundle>();

  constructor(bundles: GuidelineBundle[]) {
    for (const bundle of bundles) {
      if (this.bundles.has(bundle.bundle_id)) {
        throw new CatalogValidationError(`bundle_id duplicado no catálogo: ${bundle.bundle_id}`, { bundleId: bundle.bundle_id });
      }
      this.bundles.set(bundle.bundle_id, deepFreeze(bundle));
    }
  }

  get(bundleId: string): GuidelineBundle | null {
    return this.bundles.get(bundleId) ?? null;
  }

  require(bundleId: string): GuidelineBundle {
    const bundle = this.bundles.get(bundleId);
    if (!bundle) {
      throw new BundleNotFoundError(bundleId);
    }
    return bundle;
  }

  list(): GuidelineBundle[] {
    return Array.from(this.bundles.values());
  }
}

export { BundleCatalog, InMemoryBundleCatalog };
