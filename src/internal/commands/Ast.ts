import { Data } from "effect"
import type { Species } from "../../Species.js"
import type { FoodType, MedicineType } from "../../Supplies.js"
import type { ReportFormat } from "../../Report.js"

/**
 * A parsed console command. Animal and enclosure arguments are numeric ids;
 * they are resolved against the zoo when the command runs.
 */
export type Command = Data.TaggedEnum<{
  Start: {}
  Pause: {}
  Advance: { readonly days: number }
  Feed: { readonly animal: number; readonly food: FoodType }
  Medicine: { readonly animal: number; readonly medicine: MedicineType }
  Breed: { readonly first: number; readonly second: number }
  BuyFood: { readonly food: FoodType; readonly quantity: number }
  BuyMedicine: { readonly medicine: MedicineType; readonly quantity: number }
  BuyAnimal: { readonly species: Species; readonly enclosure: number }
  Clean: { readonly enclosure: number }
  Upgrade: { readonly enclosure: number }
  Sell: { readonly animal: number }
  Move: { readonly animal: number; readonly enclosure: number }
  Report: { readonly format: ReportFormat }
  Status: {}
  Help: {}
}>

export const Command = Data.taggedEnum<Command>()
