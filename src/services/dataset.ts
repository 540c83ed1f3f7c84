import type { Dataset, MasterRecord } from '../types';
import { api } from './api';
import { LoadingCache } from '../utils/cache';
import { normalize } from '../utils/normalize';
import { injectOrphans } from '../utils/orphans';

function freezeDataset(dataset: Dataset): Dataset {
  return Object.freeze(
    dataset.map((master): MasterRecord =>
      Object.isFrozen(master)
        ? master
        : Object.freeze({ ...master, details: Object.freeze(master.details.map((d) => Object.freeze(d))) })
    )
  );
}

// Decoded payload of each loaded dataset, before normalization
const sources = new WeakMap<Dataset, unknown>();

export function sourceOf(dataset: Dataset): unknown {
  return sources.get(dataset);
}

/**
 * Runs fetch -> normalize -> orphan injection once. Prefer `getOrLoad`,
 * which guarantees a single orphan bucket per URL.
 */
export async function loadDataset(url: string): Promise<Dataset> {
  console.log('Loading data...');
  const tree = await api.fetchJson(url);
  const dataset = freezeDataset(injectOrphans(normalize(tree)));
  sources.set(dataset, tree);
  console.log(`Data loaded successfully. ${dataset.length} records (orphan bucket included)`);
  return dataset;
}

export const datasetCache = new LoadingCache<string, Dataset>(loadDataset);

export function getOrLoad(url: string): Promise<Dataset> {
  return datasetCache.getOrLoad(url);
}
