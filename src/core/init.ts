/**
 * Debe importarse ANTES que cualquier módulo con entidades decoradas de TypeORM.
 * Garantiza que reflect-metadata está cargado.
 */
import 'reflect-metadata';

export const REFLECT_METADATA_LOADED = true;
