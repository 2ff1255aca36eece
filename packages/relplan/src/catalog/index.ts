/**
 * Catalog Module
 */

export type { Catalog } from './provider'
export { schemeFromDescriptor } from './provider'
export { MyriaCatalog } from './myria-catalog'
export { CodegenCatalog } from './codegen-catalog'
export { resolveCatalog } from './resolve'
