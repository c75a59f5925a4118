import fs from 'fs';
import { z } from 'zod';

import { CATEGORIES_MIME_TYPE, CATEGORIES_URI } from '../../config/constants';

export interface ResourceDescriptor {
  uri: string;
  name: string;
  mimeType: string;
  path: string;
}

export const CATEGORIES_RESOURCE: ResourceDescriptor = {
  uri: CATEGORIES_URI,
  name: 'categories',
  mimeType: CATEGORIES_MIME_TYPE,
  path: '/resources/categories',
};

const CategoriesDocumentSchema = z.union([
  z.array(z.string()),
  z.object({ categories: z.array(z.string()) }).transform((doc) => doc.categories),
]);

/**
 * Raw text of the category document, served as-is to callers.
 */
export function readCategoriesResource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[Categories] Failed to read resource:', message);
    throw error;
  }
}

/**
 * Category names listed in the document. Informational only: expenses are
 * never checked against this list.
 */
export function loadCategories(filePath: string): string[] {
  const raw = readCategoriesResource(filePath);
  return CategoriesDocumentSchema.parse(JSON.parse(raw));
}
