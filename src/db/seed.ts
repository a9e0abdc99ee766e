import type { Discount, Id, Ingredient, InventoryItem, MenuItem, RecipeLine, Tax } from '../types/database';
import { nowISO } from '../utils/datetime';
import { logger } from '../utils/logger';
import { db, initializeSchema } from './index';
import type { SqliteAdapter } from './sqlite-adapter';
import type { TransactionContext } from './types';

/**
 * Seed script for development and testing
 * Creates the menu, ingredients, recipes, stock, one discount and one tax
 */

export interface SeededIds {
  menuItems: Record<string, Id>;
  ingredients: Record<string, Id>;
  discountId: Id;
  taxId: Id;
}

const MENU = [
  { name: 'Espresso', price_cents: 350 },
  { name: 'Latte', price_cents: 450 },
  { name: 'Croissant', price_cents: 280 }
];

const INGREDIENTS = [
  { name: 'Coffee Beans', unit: 'g', min_threshold: 500, stock: 5000 },
  { name: 'Milk', unit: 'ml', min_threshold: 1000, stock: 5000 },
  { name: 'Butter', unit: 'g', min_threshold: 500, stock: 2000 }
];

const RECIPES: Array<{ menuItem: string; ingredient: string; quantity: number }> = [
  { menuItem: 'Espresso', ingredient: 'Coffee Beans', quantity: 18 },
  { menuItem: 'Latte', ingredient: 'Coffee Beans', quantity: 18 },
  { menuItem: 'Latte', ingredient: 'Milk', quantity: 200 },
  { menuItem: 'Croissant', ingredient: 'Butter', quantity: 15 }
];

function lookup(ids: Record<string, Id>, name: string): Id {
  const id = ids[name];
  if (id === undefined) {
    throw new Error(`Seed references unknown entry '${name}'`);
  }
  return id;
}

function seedCatalog(tx: TransactionContext): SeededIds {
  const timestamp = nowISO();
  const menuItems: Record<string, Id> = {};
  const ingredients: Record<string, Id> = {};

  for (const item of MENU) {
    const row = tx.insert<MenuItem>('menu_items', { ...item, is_active: 1 });
    menuItems[item.name] = row.id;
  }

  for (const { stock, ...ingredient } of INGREDIENTS) {
    const row = tx.insert<Ingredient>('ingredients', ingredient);
    ingredients[ingredient.name] = row.id;
    tx.insert<InventoryItem>('inventory', {
      ingredient_id: row.id,
      quantity: stock,
      last_updated: timestamp
    });
  }

  tx.insertMany<RecipeLine>(
    'menu_item_ingredients',
    RECIPES.map((recipe) => ({
      menu_item_id: lookup(menuItems, recipe.menuItem),
      ingredient_id: lookup(ingredients, recipe.ingredient),
      quantity_per_unit: recipe.quantity
    }))
  );

  const discount = tx.insert<Discount>('discounts', {
    name: 'Student 10',
    type: 'PERCENT',
    value: 10,
    applies_to: 'STUDENT'
  });

  const tax = tx.insert<Tax>('taxes', { name: 'VAT', rate: 15 });

  return { menuItems, ingredients, discountId: discount.id, taxId: tax.id };
}

export async function seedDatabase(adapter: SqliteAdapter = db): Promise<SeededIds> {
  await initializeSchema(adapter);
  const ids = await adapter.transaction(seedCatalog);
  logger.info({ ...ids }, 'Seed data created');
  return ids;
}

async function main(): Promise<void> {
  logger.info('Starting database seed...');

  try {
    await seedDatabase();
    logger.info('Database seed completed successfully');
  } finally {
    db.close();
  }
}

// Run if executed directly
if (require.main === module) {
  main()
    .then(() => {
      process.exit(0);
    })
    .catch((error) => {
      logger.error({ error }, 'Database seed failed');
      process.exit(1);
    });
}
