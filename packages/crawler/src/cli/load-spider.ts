import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Spider } from '../spider/spider.js';

/**
 * Picks the spider out of a module namespace: its default export, either
 * a Spider instance or a Spider subclass constructible without arguments.
 */
export function toSpider(namespace: unknown, source: string): Spider {
  const candidate: unknown =
    typeof namespace === 'object' && namespace !== null && 'default' in namespace
      ? namespace.default
      : undefined;

  if (candidate instanceof Spider) {
    return candidate;
  }

  if (typeof candidate === 'function' && candidate.prototype instanceof Spider) {
    const instance: unknown = Reflect.construct(candidate, []);
    if (instance instanceof Spider) {
      return instance;
    }
  }

  throw new TypeError(
    `${source} must default-export a Spider instance or a Spider subclass`,
  );
}

export async function loadSpider(modulePath: string, cwd = process.cwd()): Promise<Spider> {
  const namespace: unknown = await import(pathToFileURL(resolve(cwd, modulePath)).href);
  return toSpider(namespace, modulePath);
}
