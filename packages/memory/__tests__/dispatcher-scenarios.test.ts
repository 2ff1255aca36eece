import { describe, it, expect, beforeEach } from "vitest"
import { ConfigurationFault, NoSuchRelationError, QueryDispatcher, createApp } from "relplan"
import type { Scheme } from "relplan"
import { createInMemoryBackends, type InMemoryBackends } from "../src"

const long = (...names: string[]): Scheme => names.map((name) => ({ name, type: "LONG_TYPE" as const }))

const FILTER = "A(x) :- R(x,3)"
const TRIANGLE = "Q(x,y,z) :- R(x,y), S(y,z), T(z,x)"

describe("QueryDispatcher over in-memory backends", () => {
  let backends: InMemoryBackends
  let dispatcher: QueryDispatcher

  beforeEach(() => {
    backends = createInMemoryBackends({
      relations: { R: long("a", "b"), S: long("b", "c"), T: long("c", "a") },
    })
    dispatcher = new QueryDispatcher({ clients: backends })
  })

  it("runs a query on the cluster and follows its status", async () => {
    const submission = await dispatcher.execute({ query: FILTER })
    expect(submission.queryId).toBe(1)
    expect(submission.url).toBe("http://localhost:8753/execute?query_id=1")

    const [program] = backends.myria.queries.programs()
    expect(program?.plan.fragments.flatMap((f) => f.operators.map((op) => op.opType))).toEqual([
      "DbInsert",
      "Apply",
      "Filter",
      "TableScan",
    ])

    backends.myria.queries.update(1, "SUCCESS", { elapsedNanos: 1.5e9 })
    expect(await dispatcher.status({ queryId: "1" })).toEqual({
      queryId: 1,
      status: "SUCCESS",
      elapsedNanos: 1.5e9,
      elapsedStr: " 1.500000s",
    })
  })

  it("sizes the hypercube from the live workers", async () => {
    backends.myria.setAlive([1, 2])
    const plan = await dispatcher.optimize({ query: TRIANGLE, multiway_join: "true" })
    expect(plan).toContain("dims=2x1x1")
  })

  it("fails planning when no worker is alive", async () => {
    backends.myria.setAlive([])
    await expect(dispatcher.optimize({ query: FILTER })).rejects.toThrow(
      new ConfigurationFault("No live servers reported by localhost:8753"),
    )
    expect(await dispatcher.optimize({ query: FILTER, backend: "clang" })).toBe(
      "A = CStore(public:adhoc:A)[CApply(x=$0)[CSelect(($1 = 3))[CFileScan(public:adhoc:R)]]]",
    )
  })

  it("submits code generation programs", async () => {
    const submission = await dispatcher.execute({ query: TRIANGLE, backend: "grappa" })
    expect(submission.url).toBe("http://localhost:1337/query?qid=1")
    expect(backends.codegen.queries.programs()[0]?.relations).toEqual([
      "public:adhoc:R",
      "public:adhoc:S",
      "public:adhoc:T",
    ])
  })

  it("reports relations it does not hold", async () => {
    await expect(dispatcher.optimize({ query: "A(x) :- Ghost(x)" })).rejects.toThrow(NoSuchRelationError)
  })
})

describe("HTTP surface over in-memory backends", () => {
  it("answers 503 while the cluster is unreachable", async () => {
    const backends = createInMemoryBackends({ relations: { R: long("a", "b") } })
    const app = createApp({ clients: backends })

    backends.myria.offline = true
    const down = await app.request(`/optimize?${new URLSearchParams({ query: FILTER }).toString()}`)
    expect(down.status).toBe(503)
    expect(await down.text()).toBe("Error 503 (Unavailable): Unable to connect to REST server")

    backends.myria.offline = false
    const up = await app.request(`/optimize?${new URLSearchParams({ query: FILTER }).toString()}`)
    expect(up.status).toBe(200)
  })

  it("answers 503 when code generation is unreachable at submission", async () => {
    const backends = createInMemoryBackends({ relations: { R: long("a", "b") } })
    const app = createApp({ clients: backends })
    backends.codegen.offline = true

    const res = await app.request("/execute", {
      method: "POST",
      body: new URLSearchParams({ query: FILTER, backend: "clang", multiway_join: "true" }),
    })
    expect(res.status).toBe(503)
    expect(await res.text()).toBe("Error 503 (Unavailable): Unable to connect to REST server")
    expect(backends.codegen.queries.programs()).toEqual([])
  })
})
