/**
 * Food & Medicine catalogs.
 *
 * Prices are per unit. Nutrition is the hunger reduction a unit gives an animal
 * that accepts the food; healing is the health a medicine unit restores.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * @since 0.1.0
 * @category Food
 */
export const FoodType = Schema.Literal("eucalyptus", "herbivore_food", "seeds", "meaty_food", "general_food")

/**
 * @since 0.1.0
 * @category Food
 */
export type FoodType = typeof FoodType.Type

/**
 * @since 0.1.0
 * @category Medicine
 */
export const MedicineType = Schema.Literal("basic_med", "vet_kit")

/**
 * @since 0.1.0
 * @category Medicine
 */
export type MedicineType = typeof MedicineType.Type

export interface FoodDef {
  readonly id: FoodType
  readonly label: string
  readonly nutrition: number
  readonly unitPrice: number
}

export interface MedicineDef {
  readonly id: MedicineType
  readonly label: string
  readonly healing: number
  readonly unitPrice: number
}

/**
 * @since 0.1.0
 * @category Food
 */
export const FOODS: Record<FoodType, FoodDef> = {
  eucalyptus: { id: "eucalyptus", label: "Eucalyptus leaves", nutrition: 25, unitPrice: 3 },
  herbivore_food: { id: "herbivore_food", label: "Herbivore pellets", nutrition: 25, unitPrice: 2 },
  seeds: { id: "seeds", label: "Seed mix", nutrition: 20, unitPrice: 1.5 },
  meaty_food: { id: "meaty_food", label: "Meat", nutrition: 30, unitPrice: 4 },
  general_food: { id: "general_food", label: "General feed", nutrition: 20, unitPrice: 2.5 },
}

/**
 * @since 0.1.0
 * @category Medicine
 */
export const MEDICINES: Record<MedicineType, MedicineDef> = {
  basic_med: { id: "basic_med", label: "Basic medicine", healing: 15, unitPrice: 30 },
  vet_kit: { id: "vet_kit", label: "Veterinary kit", healing: 40, unitPrice: 90 },
}

/**
 * Hunger reduction of the automatic daily ration, whatever the food type.
 *
 * @since 0.1.0
 * @category Food
 */
export const DAILY_RATION_NUTRITION = 20

const isFoodType = Schema.is(FoodType)
const isMedicineType = Schema.is(MedicineType)

/**
 * Look up a food type by its catalog id (case-insensitive).
 *
 * @since 0.1.0
 * @category Food
 */
export const parseFoodType = (name: string): FoodType | undefined => {
  const normalized = name.trim().toLowerCase()
  return isFoodType(normalized) ? normalized : undefined
}

/**
 * Look up a medicine type by its catalog id (case-insensitive).
 *
 * @since 0.1.0
 * @category Medicine
 */
export const parseMedicineType = (name: string): MedicineType | undefined => {
  const normalized = name.trim().toLowerCase()
  return isMedicineType(normalized) ? normalized : undefined
}

/**
 * Units held per food and medicine type.
 *
 * @since 0.1.0
 * @category Inventory
 */
export class Inventory extends Schema.Class<Inventory>("Inventory")({
  food: Schema.Record({ key: FoodType, value: Schema.Int.pipe(Schema.nonNegative()) }),
  medicine: Schema.Record({ key: MedicineType, value: Schema.Int.pipe(Schema.nonNegative()) }),
}) {
  foodUnits(type: FoodType): number {
    return this.food[type]
  }

  medicineUnits(type: MedicineType): number {
    return this.medicine[type]
  }
}

/**
 * @since 0.1.0
 * @category Inventory
 */
export const adjustFood = (inventory: Inventory, type: FoodType, delta: number): Inventory =>
  new Inventory({
    food: { ...inventory.food, [type]: Math.max(0, inventory.food[type] + delta) },
    medicine: inventory.medicine,
  })

/**
 * @since 0.1.0
 * @category Inventory
 */
export const adjustMedicine = (inventory: Inventory, type: MedicineType, delta: number): Inventory =>
  new Inventory({
    food: inventory.food,
    medicine: { ...inventory.medicine, [type]: Math.max(0, inventory.medicine[type] + delta) },
  })
