import fs from "node:fs/promises";
import path from "node:path";
import type { MlRuntimeReport } from "../types/image.js";
import type { InstalledTree } from "../types/manifest.js";
import type { Snapshot } from "./filesystem.js";

/** What an op produced besides files; replayed on a cache hit. */
export type LayerOutputs = {
  tree?: InstalledTree;
  mlRuntime?: MlRuntimeReport;
  warnings?: string[];
};

export type CachedLayer = {
  key: string;
  description: string;
  created_at: string;
  snapshot: Snapshot;
  outputs: LayerOutputs;
};

/** Content-addressed layer store. Only successful layers are ever put. */
export interface LayerCache {
  get(key: string): Promise<CachedLayer | undefined>;
  put(layer: CachedLayer): Promise<void>;
}

export class MemoryLayerCache implements LayerCache {
  private readonly layers = new Map<string, CachedLayer>();

  async get(key: string): Promise<CachedLayer | undefined> {
    return this.layers.get(key);
  }

  async put(layer: CachedLayer): Promise<void> {
    this.layers.set(layer.key, layer);
  }

  get size(): number {
    return this.layers.size;
  }
}

/** One JSON file per layer under `{cacheDir}/layers/`. */
export class DiskLayerCache implements LayerCache {
  private readonly layersDir: string;

  constructor(cacheDir: string) {
    this.layersDir = path.join(cacheDir, "layers");
  }

  private layerPath(key: string): string {
    if (!/^[a-f0-9]{64}$/.test(key)) throw new Error(`Invalid layer key: ${key}`);
    return path.join(this.layersDir, `${key}.json`);
  }

  async get(key: string): Promise<CachedLayer | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.layerPath(key), "utf8");
    } catch (e) {
      if ((e as NodeJS.ErrnoException).code === "ENOENT") return undefined;
      throw e;
    }
    const layer = JSON.parse(raw) as CachedLayer;
    return layer.key === key ? layer : undefined;
  }

  async put(layer: CachedLayer): Promise<void> {
    await fs.mkdir(this.layersDir, { recursive: true });
    const target = this.layerPath(layer.key);
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(layer), "utf8");
    await fs.rename(tmp, target);
  }
}
