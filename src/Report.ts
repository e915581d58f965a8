/**
 * Zoo reports.
 *
 * A report is a structured snapshot of the zoo with a plain-text rendering.
 * There is no PDF renderer; a `pdf` request is answered with the text
 * rendering and a notice.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import type { Ledger, Transaction } from "./Ledger.js"
import { SPECIES } from "./Species.js"
import { type ZooState, findEnclosure, residentsOf } from "./State.js"
import type { VisitorDay } from "./Visitors.js"
import { formatMoney } from "./internal/pure.js"

/**
 * @since 0.1.0
 * @category Reports
 */
export const ReportFormat = Schema.Literal("text", "pdf")

/**
 * @since 0.1.0
 * @category Reports
 */
export type ReportFormat = typeof ReportFormat.Type

/**
 * How many recent event log lines and transactions a report lists.
 *
 * @since 0.1.0
 */
export const RECENT_ENTRIES = 10

export interface AnimalRow {
  readonly id: number
  readonly name: string
  readonly species: string
  readonly sex: string
  readonly ageYears: number
  readonly hunger: number
  readonly health: number
  readonly happiness: number
  readonly enclosure: string
}

export interface EnclosureRow {
  readonly id: number
  readonly name: string
  readonly habitat: string
  readonly occupancy: number
  readonly capacity: number
  readonly cleanliness: number
  readonly upgradeLevel: number
}

/**
 * @since 0.1.0
 * @category Reports
 */
export interface ZooReport {
  readonly zooName: string
  readonly day: number
  readonly balance: number
  readonly animals: ReadonlyArray<AnimalRow>
  readonly enclosures: ReadonlyArray<EnclosureRow>
  readonly visitors: VisitorDay | undefined
  readonly transactions: ReadonlyArray<Transaction>
  readonly events: ReadonlyArray<string>
}

/**
 * @since 0.1.0
 * @category Reports
 */
export interface GeneratedReport {
  readonly requested: ReportFormat
  readonly format: "text"
  readonly report: ZooReport
  readonly content: string
  readonly notice: string | undefined
}

/**
 * @since 0.1.0
 * @category Reports
 */
export const buildReport = (zooName: string, state: ZooState, ledger: Ledger): ZooReport => ({
  zooName,
  day: state.day,
  balance: ledger.balance,
  animals: state.animals.map((animal) => ({
    id: animal.id,
    name: animal.name,
    species: SPECIES[animal.species].label,
    sex: animal.sex,
    ageYears: animal.ageYears,
    hunger: animal.hunger,
    health: animal.health,
    happiness: animal.happiness,
    enclosure: findEnclosure(state, animal.enclosure)?.name ?? "(none)",
  })),
  enclosures: state.enclosures.map((enclosure) => ({
    id: enclosure.id,
    name: enclosure.name,
    habitat: enclosure.habitat,
    occupancy: residentsOf(state, enclosure).length,
    capacity: enclosure.capacity,
    cleanliness: enclosure.cleanliness,
    upgradeLevel: enclosure.upgradeLevel,
  })),
  visitors: state.lastVisitors,
  transactions: ledger.transactions.slice(-RECENT_ENTRIES),
  events: state.eventLog.slice(-RECENT_ENTRIES),
})

const section = (title: string, lines: ReadonlyArray<string>): ReadonlyArray<string> => [
  "",
  `${title}:`,
  ...(lines.length === 0 ? ["- (none)"] : lines),
]

/**
 * Render a report as plain text.
 *
 * @since 0.1.0
 * @category Reports
 */
export const renderText = (report: ZooReport): string =>
  [
    `${report.zooName} Report - Day ${report.day}`,
    `Balance: ${formatMoney(report.balance)}`,
    ...section(
      "Animals",
      report.animals.map(
        (a) =>
          `- #${a.id} ${a.name} (${a.species}, ${a.sex}, ${a.ageYears.toFixed(1)}y) in ${a.enclosure}: ` +
          `hunger ${a.hunger.toFixed(1)}, health ${a.health.toFixed(1)}, happiness ${a.happiness.toFixed(1)}`,
      ),
    ),
    ...section(
      "Enclosures Summary",
      report.enclosures.map(
        (e) =>
          `- #${e.id} ${e.name}: ${e.occupancy}/${e.capacity} animals, Cleanliness ${e.cleanliness.toFixed(1)}, ` +
          `Level ${e.upgradeLevel}`,
      ),
    ),
    ...section(
      "Visitors",
      report.visitors
        ? [
            `- Day ${report.visitors.day}: ${report.visitors.visitors} visitors, ` +
              `${formatMoney(report.visitors.total)} income, attractiveness ${report.visitors.attractiveness.toFixed(2)}`,
          ]
        : [],
    ),
    ...section(
      "Recent Transactions",
      report.transactions.map(
        (t) => `- Day ${t.day}: ${t.kind === "income" ? "+" : "-"}${formatMoney(t.amount)} ${t.reason}`,
      ),
    ),
    ...section(
      "Recent Events",
      report.events.map((line) => `- ${line}`),
    ),
  ].join("\n")

/**
 * Produce a report in the requested format.
 *
 * @since 0.1.0
 * @category Reports
 */
export const generateReport = (report: ZooReport, requested: ReportFormat): GeneratedReport => ({
  requested,
  format: "text",
  report,
  content: renderText(report),
  notice: requested === "pdf" ? "PDF output is not available; generated a text report instead." : undefined,
})
