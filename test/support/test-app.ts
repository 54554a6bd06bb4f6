import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import { configureApp } from '../../src/app.setup';
import { BRAND_REPOSITORY } from '../../src/brands/repositories/brand.repository';
import { CATEGORY_REPOSITORY } from '../../src/categories/repositories/category.repository';
import { SupabaseService } from '../../src/common/supabase.service';
import { DUMMY_REPOSITORY } from '../../src/dummy/repositories/dummy.repository';
import { PRODUCT_REPOSITORY } from '../../src/products/repositories/product.repository';
import { InMemoryCatalog } from './in-memory-catalog';

export interface TestApp {
  app: INestApplication;
  catalog: InMemoryCatalog;
}

/** Boots the full AppModule with every repository backed by an in-memory catalog. */
export async function createTestApp(): Promise<TestApp> {
  process.env.THROTTLE_LIMIT = '10000';
  const catalog = new InMemoryCatalog();

  const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
    .overrideProvider(SupabaseService)
    .useValue({
      getClient: () => {
        throw new Error('The HTTP tests never reach Supabase');
      },
    })
    .overrideProvider(PRODUCT_REPOSITORY)
    .useValue(catalog.productRepository)
    .overrideProvider(CATEGORY_REPOSITORY)
    .useValue(catalog.categoryRepository)
    .overrideProvider(BRAND_REPOSITORY)
    .useValue(catalog.brandRepository)
    .overrideProvider(DUMMY_REPOSITORY)
    .useValue(catalog.dummyRepository)
    .compile();

  const app = moduleRef.createNestApplication({ logger: false });
  configureApp(app);
  await app.init();
  return { app, catalog };
}
