import { access, mkdir, readFile, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { pino } from 'pino';
import {
  SOURCE_EXTENSION,
  TemplateExistsError,
  TemplateNotFoundError,
  validateTemplateName,
  type TemplateStore,
} from '@deployer/core';
import { isNotFound, listSources } from './fs-utils.js';

const logger = pino({ name: 'template-store', level: process.env.LOG_LEVEL || 'info' });

/**
 * Templates are plain `.sol` files in one directory. Names are validated
 * again here so no caller can reach outside it.
 */
export class FileTemplateStore implements TemplateStore {
  constructor(readonly dir: string) {}

  list(): Promise<string[]> {
    return listSources(this.dir);
  }

  async exists(name: string): Promise<boolean> {
    try {
      await access(this.pathOf(validateTemplateName(name)));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async read(name: string): Promise<string> {
    const templateName = validateTemplateName(name);
    try {
      return await readFile(this.pathOf(templateName), 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new TemplateNotFoundError(templateName);
      }
      throw error;
    }
  }

  async add(name: string, source: string): Promise<void> {
    const templateName = validateTemplateName(name);
    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(this.pathOf(templateName), source, { encoding: 'utf8', flag: 'wx' });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        throw new TemplateExistsError(templateName);
      }
      throw error;
    }
    logger.info({ template: templateName }, 'Template added');
  }

  async remove(name: string): Promise<void> {
    const templateName = validateTemplateName(name);
    try {
      await unlink(this.pathOf(templateName));
    } catch (error) {
      if (isNotFound(error)) {
        throw new TemplateNotFoundError(templateName);
      }
      throw error;
    }
    logger.info({ template: templateName }, 'Template removed');
  }

  private pathOf(templateName: string): string {
    return path.join(this.dir, `${templateName}${SOURCE_EXTENSION}`);
  }
}
