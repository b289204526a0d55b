import { captureConfigError } from "../../../tests/utils/capture-config-error"
import { createConfigRecord } from "../config-record"

describe("createConfigRecord", () => {
  const base = {
    url: "https://crm.test",
    clientId: "test-client",
    clientSecret: "test-secret",
  }

  it("builds a record with an empty customModules default", () => {
    expect(createConfigRecord(base)).toEqual({ ...base, customModules: [] })
  })

  it("keeps custom modules in order", () => {
    const record = createConfigRecord({
      ...base,
      customModules: [{ name: "Leads" }, { name: "Invoices", table: "aos_invoices" }],
    })

    expect(record.customModules).toEqual([
      { name: "Leads" },
      { name: "Invoices", table: "aos_invoices" },
    ])
  })

  it("deep-freezes the record", () => {
    const record = createConfigRecord({ ...base, customModules: [{ name: "Leads" }] })

    expect(Object.isFrozen(record)).toBe(true)
    expect(Object.isFrozen(record.customModules)).toBe(true)
    expect(Object.isFrozen(record.customModules[0])).toBe(true)
  })

  it("does not share module objects with the input", () => {
    const modules = [{ name: "Leads" }]
    const record = createConfigRecord({ ...base, customModules: modules })

    modules[0] = { name: "Changed" }

    expect(record.customModules).toEqual([{ name: "Leads" }])
  })

  it("returns a fresh customModules array per record", () => {
    const a = createConfigRecord(base)
    const b = createConfigRecord(base)

    expect(a.customModules).not.toBe(b.customModules)
  })

  it.each(["url", "clientId", "clientSecret"] as const)("rejects a missing %s", (field) => {
    const input: Record<string, unknown> = { ...base }
    delete input[field]

    const err = captureConfigError(() => createConfigRecord(input))

    expect(err.code).toBe("invalid_config")
    expect(err.context.issues).toEqual([expect.stringMatching(new RegExp(`^${field}: `))])
  })

  it.each(["url", "clientId", "clientSecret"] as const)("rejects an empty %s", (field) => {
    const err = captureConfigError(() => createConfigRecord({ ...base, [field]: "" }))

    expect(err.code).toBe("invalid_config")
  })

  it("rejects unknown fields", () => {
    const err = captureConfigError(() => createConfigRecord({ ...base, extra: "x" }))

    expect(err.code).toBe("invalid_config")
  })

  it("rejects non-string module values", () => {
    const err = captureConfigError(() =>
      createConfigRecord({ ...base, customModules: [{ name: 1 }] }),
    )

    expect(err.code).toBe("invalid_config")
    expect(err.context.issues).toEqual([expect.stringMatching(/^customModules\.0\.name: /)])
  })

  it("rejects a non-object input", () => {
    const err = captureConfigError(() => createConfigRecord(null))

    expect(err.code).toBe("invalid_config")
    expect(err.context.issues).toEqual([expect.stringMatching(/^\(root\): /)])
  })
})
