import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { intParam } from '../common/pipes/param-pipes';
import { Page } from '../common/types/page';
import { CreateDummyDto, SearchDummyQueryDto } from './dto/dummy.dto';
import { DummyService } from './dummy.service';
import { Dummy } from './entities/dummy.entity';

@Controller('dummy')
export class DummyController {
    constructor(private readonly dummyService: DummyService) {}

    @Get()
    async findAll(@Query() query: PaginationQueryDto): Promise<Page<Dummy>> {
        return this.dummyService.findAll(query.limit, query.offset);
    }

    @Post()
    async create(@Body() dto: CreateDummyDto): Promise<Dummy> {
        return this.dummyService.create(dto.name);
    }

    @Get('search')
    async search(@Query() query: SearchDummyQueryDto): Promise<Dummy[]> {
        return this.dummyService.findByName(query.name);
    }

    @Get(':id')
    async findOne(@Param('id', intParam) id: number): Promise<Dummy> {
        return this.dummyService.findOne(id);
    }
}
