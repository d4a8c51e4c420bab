import { decodeHTML } from 'entities';
import { ENTITIES } from '../constants.js';

const ENTITY_REFERENCE = /&(#[0-9]+|#[xX][0-9a-fA-F]+|[A-Za-z][A-Za-z0-9]*);/g;

/**
 * Replace character references in `text`.
 *
 * Names in the fixed table win; numeric references and the standard HTML names
 * are decoded next; anything else is left exactly as written.
 */
export const decodeEntities = (text: string): string => {
  if (!text.includes('&')) {
    return text;
  }

  return text.replace(ENTITY_REFERENCE, (reference: string, name: string) => {
    if (Object.hasOwn(ENTITIES, name)) {
      return ENTITIES[name];
    }
    return decodeHTML(reference);
  });
};
