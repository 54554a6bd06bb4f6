import { createClient, PostgrestError } from '@supabase/supabase-js';
import * as dotenv from 'dotenv';
import * as path from 'path';
import seed from './data/catalog-seed.json';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

const supabaseUrl = process.env.SUPABASE_URL;
// Seeding bypasses RLS, so it needs the service role key.
const supabaseServiceKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

if (!supabaseUrl || !supabaseServiceKey) {
  console.error('Error: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set in environment variables.');
  process.exit(1);
}

const supabase = createClient(supabaseUrl, supabaseServiceKey, {
  auth: { persistSession: false, autoRefreshToken: false },
});

interface IdByKey {
  id: string;
  key: string;
}

function fail(step: string, error: PostgrestError): never {
  console.error(`Error seeding ${step}:`, error.message);
  if (error.details) console.error('Details:', error.details);
  if (error.hint) console.error('Hint:', error.hint);
  process.exit(1);
}

async function seedBrands(): Promise<Map<string, string>> {
  const { data, error } = await supabase
    .from('brands')
    .upsert(seed.brands, { onConflict: 'name' })
    .select('id, name');
  if (error) fail('brands', error);

  const rows: Array<{ id: string; name: string }> = data ?? [];
  console.log(`Upserted ${rows.length} brands.`);
  return new Map(rows.map((row) => [row.name, row.id]));
}

// Parents are listed before their children, so one pass resolves every parent slug.
async function seedCategories(): Promise<Map<string, string>> {
  const ids = new Map<string, string>();
  for (const category of seed.categories) {
    const parentId = category.parentSlug ? ids.get(category.parentSlug) : null;
    if (parentId === undefined) {
      console.error(`Category ${category.slug} names unknown parent ${category.parentSlug}.`);
      process.exit(1);
    }
    const { data, error } = await supabase
      .from('categories')
      .upsert(
        { name: category.name, slug: category.slug, description: category.description, parent_id: parentId },
        { onConflict: 'slug' },
      )
      .select('id, slug')
      .single();
    if (error) fail(`category ${category.slug}`, error);

    const row: { id: string; slug: string } = data;
    ids.set(row.slug, row.id);
  }
  console.log(`Upserted ${ids.size} categories.`);
  return ids;
}

async function seedProducts(brandIds: Map<string, string>, categoryIds: Map<string, string>): Promise<void> {
  const rows = seed.products.map((product) => ({
    name: product.name,
    slug: product.slug,
    sku: product.sku,
    description: product.description,
    price_amount: product.price,
    price_currency: 'USD',
    stock: product.stock,
    is_available: product.stock > 0,
    is_new: product.isNew,
    brand_id: brandIds.get(product.brand) ?? null,
    tags: product.tags,
  }));

  const { data, error } = await supabase
    .from('products')
    .upsert(rows, { onConflict: 'sku' })
    .select('id, sku');
  if (error) fail('products', error);

  const inserted: Array<{ id: string; sku: string }> = data ?? [];
  const productIds: IdByKey[] = inserted.map((row) => ({ id: row.id, key: row.sku }));
  console.log(`Upserted ${productIds.length} products.`);

  const links = seed.products.flatMap((product) => {
    const productId = productIds.find((entry) => entry.key === product.sku)?.id;
    return product.categories.flatMap((slug) => {
      const categoryId = categoryIds.get(slug);
      return productId && categoryId ? [{ product_id: productId, category_id: categoryId }] : [];
    });
  });

  const { error: linkError } = await supabase
    .from('product_categories')
    .upsert(links, { onConflict: 'product_id,category_id' });
  if (linkError) fail('product categories', linkError);
  console.log(`Linked ${links.length} product categories.`);
}

async function seedCatalog(): Promise<void> {
  console.log('Seeding catalog...');
  const brandIds = await seedBrands();
  const categoryIds = await seedCategories();
  await seedProducts(brandIds, categoryIds);
  console.log('Catalog seeded.');
}

seedCatalog()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error('Unexpected error while seeding:', error);
    process.exit(1);
  });
