/**
 * Template Store
 *
 * Holds the published template of each page. Publishing swaps one frozen
 * reference, so a frame that already took its snapshot keeps it. Every load
 * and reload takes a generation token when it starts; a result is published
 * only when no later load or reload of the same page has been published
 * since. Pages never invalidate each other.
 */

import { CompileError, handle } from '../common/errors';
import { compile, type CompileResult } from '../compiler/compile';
import type { IntermediateTemplate } from '../compiler/types';
import { logger } from '../dev/logger';

export interface TemplateStoreOptions {
  onCompileError?: (error: CompileError) => void;
}

interface Published {
  readonly template: IntermediateTemplate;
  readonly generation: number;
}

export class TemplateStore {
  private readonly templates = new Map<string, Published>();
  private latest = 0;

  constructor(private readonly options: TemplateStoreOptions = {}) {}

  /** Generation of the most recent load or reload */
  get generation(): number {
    return this.latest;
  }

  get(page: string): IntermediateTemplate | undefined {
    return this.templates.get(page)?.template;
  }

  pages(): string[] {
    return [...this.templates.keys()];
  }

  /** Compiles and publishes synchronously. Supersedes pending reloads of the same page. */
  load(markup: string): CompileResult {
    return this.publish(compile(markup), ++this.latest);
  }

  async reload(source: string | Promise<string>): Promise<CompileResult> {
    const generation = ++this.latest;
    const read = await handle(Promise.resolve(source));

    if (read.error !== null) {
      return this.publish(
        {
          data: null,
          error: new CompileError('MALFORMED_MARKUP', `Markup source failed: ${read.error.message}`),
        },
        generation
      );
    }
    return this.publish(compile(read.data), generation);
  }

  private publish(result: CompileResult, generation: number): CompileResult {
    if (result.error !== null) {
      logger.error('Template compile failed; keeping the previous template.', result.error.message);
      this.options.onCompileError?.(result.error);
      return result;
    }

    const { page } = result.data;
    const current = this.templates.get(page);
    if (current && current.generation > generation) {
      logger.debug(
        `Discarding reload ${generation} of '${page}'; reload ${current.generation} is newer`
      );
      return {
        data: null,
        error: new CompileError(
          'STALE_RELOAD',
          `Reload ${generation} was superseded by reload ${current.generation}`
        ),
      };
    }

    this.templates.set(page, { template: result.data, generation });
    logger.debug(`Published page '${page}'`);
    return result;
  }
}
