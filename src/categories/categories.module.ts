import { Module } from '@nestjs/common';
import { CategoriesController } from './categories.controller';
import { CategoriesService } from './categories.service';
import { CATEGORY_REPOSITORY } from './repositories/category.repository';
import { SupabaseCategoryRepository } from './repositories/supabase-category.repository';

@Module({
  controllers: [CategoriesController],
  providers: [
    CategoriesService,
    { provide: CATEGORY_REPOSITORY, useClass: SupabaseCategoryRepository },
  ],
  exports: [CategoriesService],
})
export class CategoriesModule {}
