import { ConfigurationFault } from '../errors'
import type { BackendClients } from '../executor/provider'
import type { Backend } from '../pipeline/request'
import { CodegenCatalog } from './codegen-catalog'
import { MyriaCatalog } from './myria-catalog'
import type { Catalog } from './provider'

/**
 * Pick the catalog for a backend. The clustered engine and multiway-join
 * planning both need a live cluster: zero servers is a configuration fault.
 */
export async function resolveCatalog(
  backend: Backend,
  multiwayJoin: boolean,
  clients: BackendClients,
): Promise<Catalog> {
  if (backend === 'myria' || multiwayJoin) {
    const catalog = new MyriaCatalog(clients.myria)
    const servers = await catalog.getNumServers()
    if (servers === 0) {
      throw new ConfigurationFault(
        `No live servers reported by ${clients.myria.hostname}:${clients.myria.port}`,
      )
    }
    return catalog
  }
  return new CodegenCatalog(clients.codegen)
}
