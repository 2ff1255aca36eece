import { describe, it, expect, beforeEach } from "vitest"
import { BackendExecutionError, ConnectivityError } from "relplan"
import type { CodegenProgram, Scheme } from "relplan"
import { QueryLog, RelationStore, createInMemoryBackends, type InMemoryBackends } from "../src"

// =============================================================================
// TEST DATA
// =============================================================================

const PAIR: Scheme = [
  { name: "a", type: "LONG_TYPE" },
  { name: "b", type: "LONG_TYPE" },
]

const R = { user: "public", program: "adhoc", name: "R" }

function codegenProgram(relations: string[]): CodegenProgram {
  return {
    rawQuery: "A(x) :- R(x,_)",
    logicalRa: "A = Apply(x=$0)[Scan(public:adhoc:R)]",
    physicalRa: "A = CStore(public:adhoc:A)[CApply(x=$0)[CFileScan(public:adhoc:R)]]",
    backend: "clang",
    language: "datalog",
    relations,
    profilingMode: [],
  }
}

// =============================================================================
// STORE
// =============================================================================

describe("RelationStore", () => {
  it("expands short names to the default user and program", () => {
    const store = new RelationStore()
    store.put("R", PAIR, 10)
    store.put("adhoc2:S", PAIR)
    store.put("lab:exp:T", PAIR)
    expect(store.keys()).toEqual(["public:adhoc:R", "public:adhoc2:S", "lab:exp:T"])
    expect(store.has(R)).toBe(true)
  })

  it("describes relations the way the REST services do", () => {
    const store = new RelationStore()
    store.put("R", PAIR, 10)
    expect(store.describe(R)).toEqual({
      relationKey: { userName: "public", programName: "adhoc", relationName: "R" },
      schema: { columnNames: ["a", "b"], columnTypes: ["LONG_TYPE", "LONG_TYPE"] },
      numTuples: 10,
    })
    expect(store.describe({ ...R, name: "Ghost" })).toBeNull()
  })

  it("replaces and deletes relations", () => {
    const store = new RelationStore()
    store.put("R", PAIR)
    store.put(R, [{ name: "only", type: "STRING_TYPE" }])
    expect(store.size).toBe(1)
    expect(store.get(R)?.scheme).toEqual([{ name: "only", type: "STRING_TYPE" }])
    expect(store.delete(R)).toBe(true)
    expect(store.delete(R)).toBe(false)
  })
})

describe("QueryLog", () => {
  it("hands out sequential ids", () => {
    const log = new QueryLog<string>(40)
    expect(log.record("first").queryId).toBe(40)
    expect(log.record("second").status).toEqual({ queryId: 41, status: "ACCEPTED" })
    expect(log.programs()).toEqual(["first", "second"])
  })

  it("merges updates into the reported status", () => {
    const log = new QueryLog<string>()
    log.record("q")
    expect(log.update(1, "SUCCESS", { elapsedNanos: 2e9, queryId: 99 })).toEqual({
      queryId: 1,
      status: "SUCCESS",
      elapsedNanos: 2e9,
    })
    expect(() => log.update(2, "SUCCESS")).toThrow("Query not found: 2")
  })
})

// =============================================================================
// BACKENDS
// =============================================================================

describe("createInMemoryBackends", () => {
  let backends: InMemoryBackends

  beforeEach(() => {
    backends = createInMemoryBackends({ relations: { R: PAIR } })
  })

  it("shares one relation store", async () => {
    backends.relations.put("S", PAIR)
    expect(await backends.myria.dataset({ ...R, name: "S" })).not.toBeNull()
    expect(await backends.codegen.relation({ ...R, name: "S" })).not.toBeNull()
  })

  it("reports registered and live workers", async () => {
    expect(await backends.myria.workers()).toEqual({
      "1": "worker-1:9001",
      "2": "worker-2:9002",
      "3": "worker-3:9003",
      "4": "worker-4:9004",
    })
    backends.myria.setAlive([2, 4])
    expect(await backends.myria.workersAlive()).toEqual([2, 4])
    expect(() => backends.myria.setAlive([5])).toThrow("Unknown worker: 5")
  })

  it("accepts programs and reports their status", async () => {
    const status = await backends.codegen.submitQuery(codegenProgram(["public:adhoc:R"]))
    expect(status).toEqual({ queryId: 1, status: "ACCEPTED" })
    backends.codegen.queries.update(1, "RUNNING")
    expect(await backends.codegen.checkQuery(1)).toEqual({ queryId: 1, status: "RUNNING" })
  })

  it("refuses programs over relations it does not hold", async () => {
    await expect(backends.codegen.submitQuery(codegenProgram(["public:adhoc:Z"]))).rejects.toThrow(
      new BackendExecutionError("Relation public:adhoc:Z is not loaded"),
    )
  })

  it("answers unknown query ids with 404", async () => {
    await expect(backends.myria.getQueryStatus(8)).rejects.toMatchObject({
      message: "Query 8 was not found",
      status: 404,
      url: "http://localhost:8753",
    })
  })

  it("fails every call while offline", async () => {
    backends.myria.offline = true
    await expect(backends.myria.workersAlive()).rejects.toThrow(ConnectivityError)
    await expect(backends.myria.workers()).rejects.toThrow("Unable to connect to http://localhost:8753")
    expect(await backends.codegen.relation(R)).not.toBeNull()
  })

  it("resets to an empty, reachable state", async () => {
    await backends.myria.submitQuery({
      rawQuery: "",
      logicalRa: "",
      language: "datalog",
      plan: { type: "SubQuery", fragments: [] },
      profilingMode: [],
    })
    backends.myria.offline = true
    backends.reset()
    expect(backends.relations.size).toBe(0)
    expect(backends.myria.queries.size).toBe(0)
    expect(await backends.myria.workersAlive()).toHaveLength(4)
  })
})
