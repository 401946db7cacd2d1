/**
 * Carrega o catálogo de bundles de um arquivo YAML.
 *
 * Formato: `bundles: [ { bundle_id, name, elements: [...] } ]`.
 * A validação de cada bundle é feita por parseBundleDefinition.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'yaml';
import { GuidelineBundle } from '../entidades/tipos';
import { CatalogValidationError, errorMessage } from '../entidades/AdherenceErrors';
import { InMemoryBundleCatalog } from './BundleCatalog';
import { parseBundleDefinition } from './BundleDefinitionParser';
import { isRecord } from '../utilitarios/Revive';

const DEFAULT_CATALOG_PATH = path.join(__dirname, 'bundles.yaml');

function parseBundleCatalogYaml(source: string, origin: string = 'catalog'): GuidelineBundle[] {
  let document: unknown;
  try {
    document = parse(source);
  } catch (error) {
    throw new CatalogValidationError(
      `${origin}: YAML inválido: ${errorMessage(error)}`,
      { origin }
    );
  }

  if (!isRecord(document) || !Array.isArray(document.bundles)) {
    throw new CatalogValidationError(`${origin}: esperado objeto com lista 'bundles'`, { origin });
  }

  return document.bundles.map((raw: unknown) => parseBundleDefinition(raw));
}

/**
 * @param enabledBundles lista de bundle_ids habilitados; vazia = todos
 */
async function loadBundleCatalog(
  filePath: string = DEFAULT_CATALOG_PATH,
  enabledBundles: string[] = []
): Promise<InMemoryBundleCatalog> {
  const source = await fs.readFile(filePath, 'utf-8');
  const bundles = parseBundleCatalogYaml(source, filePath);

  for (const id of enabledBundles) {
    if (!bundles.some(b => b.bundle_id === id)) {
      throw new CatalogValidationError(`${filePath}: bundle habilitado '${id}' não existe`, { bundleId: id });
    }
  }

  const selected = enabledBundles.length > 0
    ? bundles.filter(b => enabledBundles.includes(b.bundle_id))
    : bundles;

  return new InMemoryBundleCatalog(selected);
}

export { DEFAULT_CATALOG_PATH, parseBundleCatalogYaml, loadBundleCatalog };
