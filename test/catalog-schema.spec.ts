import { readFileSync } from 'fs';
import { join } from 'path';

const schema = readFileSync(join(__dirname, '../supabase/migrations/20250407000000_catalog_schema.sql'), 'utf8');

function tableBody(table: string): string {
  const match = new RegExp(`create table if not exists ${table} \\(([\\s\\S]*?)\\n\\);`).exec(schema);
  if (!match) {
    throw new Error(`Table ${table} is missing from the schema`);
  }
  return match[1];
}

describe('catalog schema', () => {
  it.each(['product_categories', 'product_variants', 'product_images', 'config_options', 'product_reviews'])(
    'removes %s rows together with their product',
    (table) => {
      expect(tableBody(table)).toMatch(/product_id uuid not null references products\(id\) on delete cascade/);
    },
  );

  it('removes variant images together with their variant', () => {
    expect(tableBody('product_images')).toMatch(/variant_id uuid references product_variants\(id\) on delete cascade/);
  });

  it('keeps products and child categories when a brand or parent is deleted', () => {
    expect(tableBody('products')).toMatch(/brand_id uuid references brands\(id\) on delete set null/);
    expect(tableBody('categories')).toMatch(/parent_id uuid references categories\(id\) on delete set null/);
  });
});
