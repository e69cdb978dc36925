import { Blueprint } from './blueprint.js';
import { EntryPointError } from './errors.js';
import type { AppServer } from './server.js';

export interface LoadBlueprintsOptions {
  /** Entry-point groups to load, in order */
  entryPoints: readonly string[];
}

/**
 * Load and register every blueprint advertised under the given groups.
 *
 * An entry point may export a Blueprint or a function that receives the
 * server and returns one. Failures are not caught: a broken plugin aborts
 * application setup.
 */
export async function loadBlueprints(
  server: AppServer,
  options: LoadBlueprintsOptions,
): Promise<Blueprint[]> {
  const loaded: Blueprint[] = [];

  for (const group of options.entryPoints) {
    for (const entryPoint of server.entryPoints.select(group)) {
      const target = await entryPoint.load();
      const blueprint: unknown = typeof target === 'function' ? await target(server) : target;

      if (!(blueprint instanceof Blueprint)) {
        throw new EntryPointError(
          `Entry point ${group}:${entryPoint.name} (${entryPoint.source}) did not provide a Blueprint`,
        );
      }

      server.registerBlueprint(blueprint);
      loaded.push(blueprint);
      server.logger.debug('blueprint loaded', {
        group,
        entryPoint: entryPoint.name,
        source: entryPoint.source,
        blueprint: blueprint.name,
      });
    }
  }

  return loaded;
}
