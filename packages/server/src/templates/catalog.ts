import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import type { TemplateSummary } from '@flowscribe/shared';
import { TemplateNotFoundError } from '../graph/errors.js';
import type { GraphModel } from '../graph/model.js';
import { deserialize } from '../graph/serializer.js';
import type { TemplateSource } from '../session/store.js';

const TEMPLATE_ID_RE = /^[A-Za-z0-9_-]+$/;
const TEMPLATE_EXT = '.dot';

/**
 * Turn a template file stem into a display name.
 *
 * @example
 * templateDisplayName('order_fulfillment'); // 'Order Fulfillment'
 */
export function templateDisplayName(id: string): string {
  return id
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Predefined flowcharts stored as canonical DOT files in one directory.
 *
 * Files are read on every call, so templates can be added or edited
 * without a restart.
 */
export class FileTemplateCatalog implements TemplateSource {
  constructor(private readonly dir: string) {}

  /** Every `.dot` file in the directory, sorted by id. */
  list(): TemplateSummary[] {
    if (!existsSync(this.dir)) return [];
    return readdirSync(this.dir)
      .filter((file) => file.endsWith(TEMPLATE_EXT))
      .map((file) => file.slice(0, -TEMPLATE_EXT.length))
      .filter((id) => TEMPLATE_ID_RE.test(id))
      .sort()
      .map((id) => ({ id, name: templateDisplayName(id) }));
  }

  /**
   * Read and parse the template named `id`.
   *
   * Ids outside `[A-Za-z0-9_-]` are rejected before touching the disk,
   * so a request can never escape the template directory.
   *
   * @throws {TemplateNotFoundError} if the id is invalid or no file exists.
   * @throws {ParseError} if the file is not valid canonical DOT.
   */
  load(id: string): GraphModel {
    if (!TEMPLATE_ID_RE.test(id)) {
      throw new TemplateNotFoundError(id);
    }
    const file = path.join(this.dir, `${id}${TEMPLATE_EXT}`);
    if (!existsSync(file)) {
      throw new TemplateNotFoundError(id);
    }
    return deserialize(readFileSync(file, 'utf8'));
  }
}
