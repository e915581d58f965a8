import { describe, it, expect } from "vitest"
import * as OzZoo from "../src/index.js"

describe("public API export surface", () => {
  it("exposes the services", () => {
    expect(OzZoo).toHaveProperty("Zoo")
    expect(OzZoo).toHaveProperty("GameLoop")
    expect(OzZoo).toHaveProperty("Finance")
    expect(OzZoo).toHaveProperty("HealthMonitor")
    expect(OzZoo).toHaveProperty("ZooConfig")
  })

  it("exposes the domain and the command console", () => {
    expect(OzZoo).toHaveProperty("Animal")
    expect(OzZoo).toHaveProperty("Enclosure")
    expect(OzZoo).toHaveProperty("SPECIES")
    expect(OzZoo).toHaveProperty("runDay")
    expect(OzZoo).toHaveProperty("executeLine")
    expect(OzZoo).toHaveProperty("InsufficientFundsError")
  })
})
