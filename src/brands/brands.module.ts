import { Module } from '@nestjs/common';
import { BrandsController } from './brands.controller';
import { BrandsService } from './brands.service';
import { BRAND_REPOSITORY } from './repositories/brand.repository';
import { SupabaseBrandRepository } from './repositories/supabase-brand.repository';

@Module({
  controllers: [BrandsController],
  providers: [
    BrandsService,
    { provide: BRAND_REPOSITORY, useClass: SupabaseBrandRepository },
  ],
  exports: [BrandsService],
})
export class BrandsModule {}
