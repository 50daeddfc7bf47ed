import {readdirSync} from 'node:fs';
import {defineConfig} from 'vitest/config';

// Find all vitest.config*.ts files up to depth 2 from repo root, skipping node_modules.
function* getProjects(): Iterable<string> {
  const maxDepth = 2; // depth relative to repo root

  function* walk(
    basePath: string,
    dirUrl: URL,
    depth: number,
  ): Generator<string> {
    const entries = readdirSync(dirUrl, {withFileTypes: true});

    const configNames = entries
      .filter(e => e.isFile() && /^vitest\.config.*\.ts$/.test(e.name))
      .map(e => e.name);
    for (const name of configNames) {
      // Skip the root config file to avoid self-reference
      if (basePath === '' && name === 'vitest.config.ts') continue;
      yield `${basePath}${name}`;
    }

    for (const e of entries) {
      if (!e.isDirectory()) continue;
      if (e.name === 'node_modules' || e.name.startsWith('.')) continue;
      if (depth > 0) {
        yield* walk(
          `${basePath}${e.name}/`,
          new URL(`${e.name}/`, dirUrl),
          depth - 1,
        );
      }
    }
  }

  yield* walk('', new URL('./', import.meta.url), maxDepth);
}

export default defineConfig({
  test: {
    projects: [...getProjects()],
  },
});
