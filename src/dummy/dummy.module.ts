import { Module } from '@nestjs/common';
import { DummyController } from './dummy.controller';
import { DummyService } from './dummy.service';
import { DUMMY_REPOSITORY } from './repositories/dummy.repository';
import { SupabaseDummyRepository } from './repositories/supabase-dummy.repository';

@Module({
  controllers: [DummyController],
  providers: [
    DummyService,
    { provide: DUMMY_REPOSITORY, useClass: SupabaseDummyRepository },
  ],
})
export class DummyModule {}
