// Entry Point Discovery
//
// Plugins advertise route-contributing modules in their plugins/{name}/plugin.json
// manifest, grouped by entry-point group:
//
//   {
//     "name": "records",
//     "entryPoints": {
//       "main.blueprints": {
//         "records": { "module": "./blueprint.ts", "export": "createBlueprint" }
//       }
//     }
//   }
//
// An application names the groups it wants; the same mechanism assembles a
// real application and the throwaway shell used to mirror another one.

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import { EntryPointError } from './errors.js';
import type { StructuredLogger } from './logger.js';

export interface EntryPoint {
  group: string;
  name: string;
  /** Where the entry point was declared (plugin name or "static") */
  source: string;
  load(): Promise<unknown>;
}

export interface EntryPointSource {
  select(group: string): EntryPoint[];
}

// ─── Manifest Schema ─────────────────────────────────────────────────────────

const EntryPointTargetSchema = z.object({
  module: z.string().min(1),
  export: z.string().min(1).default('default'),
});

export const PluginManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().optional(),
  description: z.string().optional(),
  entryPoints: z.record(z.record(EntryPointTargetSchema)).default({}),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

interface DiscoveredManifest {
  dirName: string;
  pluginDir: string;
  manifest: PluginManifest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// ─── Manifest Source ─────────────────────────────────────────────────────────

/**
 * Reads entry points from `<rootDir>/plugins/<name>/plugin.json`.
 */
export class ManifestEntryPointSource implements EntryPointSource {
  readonly pluginsDir: string;
  private readonly logger?: StructuredLogger;

  constructor(rootDir: string, options: { logger?: StructuredLogger } = {}) {
    this.pluginsDir = path.join(rootDir, 'plugins');
    this.logger = options.logger;
  }

  select(group: string): EntryPoint[] {
    const entryPoints: EntryPoint[] = [];

    for (const { dirName, pluginDir, manifest } of this.discover()) {
      const targets = manifest.entryPoints[group] ?? {};
      for (const name of Object.keys(targets).sort()) {
        const target = targets[name];
        const modulePath = path.resolve(pluginDir, target.module);
        entryPoints.push({
          group,
          name,
          source: manifest.name,
          load: () => loadExport(modulePath, target.export, `${dirName}:${group}:${name}`),
        });
      }
    }

    return entryPoints;
  }

  private discover(): DiscoveredManifest[] {
    if (!fs.existsSync(this.pluginsDir)) {
      this.logger?.warn('plugins directory not found', { pluginsDir: this.pluginsDir });
      return [];
    }

    return fs
      .readdirSync(this.pluginsDir)
      .sort()
      .filter((dir) => fs.existsSync(path.join(this.pluginsDir, dir, 'plugin.json')))
      .map((dirName) => {
        const pluginDir = path.join(this.pluginsDir, dirName);
        const manifestPath = path.join(pluginDir, 'plugin.json');

        let json: unknown;
        try {
          json = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
        } catch (err) {
          throw new EntryPointError(
            `Invalid JSON in ${manifestPath}: ${err instanceof Error ? err.message : String(err)}`,
          );
        }

        const result = PluginManifestSchema.safeParse(json);
        if (!result.success) {
          const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
          throw new EntryPointError(`Invalid plugin manifest ${manifestPath}: ${issues}`);
        }

        return { dirName, pluginDir, manifest: result.data };
      });
  }
}

async function loadExport(modulePath: string, exportName: string, label: string): Promise<unknown> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(modulePath).href);
  } catch (err) {
    throw new EntryPointError(
      `Failed to load entry point ${label} from ${modulePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isRecord(mod) || !(exportName in mod)) {
    throw new EntryPointError(`Entry point ${label}: module ${modulePath} has no export '${exportName}'`);
  }
  return mod[exportName];
}

// ─── Static Source ───────────────────────────────────────────────────────────

/**
 * In-memory entry points: group -> entry name -> exported value.
 */
export class StaticEntryPointSource implements EntryPointSource {
  private readonly groups: Record<string, Record<string, unknown>>;

  constructor(groups: Record<string, Record<string, unknown>>) {
    this.groups = groups;
  }

  select(group: string): EntryPoint[] {
    return Object.entries(this.groups[group] ?? {}).map(([name, value]) => ({
      group,
      name,
      source: 'static',
      load: async () => value,
    }));
  }
}
