import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Logger, Param, Post, Put, Query } from '@nestjs/common';
import { BrandNotFoundError } from '../common/errors/catalog.errors';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { uuidParam } from '../common/pipes/param-pipes';
import { Page } from '../common/types/page';
import { BrandsService } from './brands.service';
import { CreateBrandDto, UpdateBrandDto } from './dto/brand.dto';
import { Brand } from './entities/brand.entity';

@Controller('brands')
export class BrandsController {
    private readonly logger = new Logger(BrandsController.name);

    constructor(private readonly brandsService: BrandsService) {}

    @Post()
    async create(@Body() dto: CreateBrandDto): Promise<Brand> {
        this.logger.log(`Creating brand "${dto.name}"`);
        return this.brandsService.create(dto);
    }

    @Get()
    async findAll(@Query() query: PaginationQueryDto): Promise<Page<Brand>> {
        return this.brandsService.findAll(query.limit, query.offset);
    }

    @Get('name/:name')
    async findByName(@Param('name') name: string): Promise<Brand> {
        return this.brandsService.findByName(name);
    }

    @Get(':id')
    async findOne(@Param('id', uuidParam) id: string): Promise<Brand> {
        return this.brandsService.findOne(id);
    }

    @Put(':id')
    async update(@Param('id', uuidParam) id: string, @Body() dto: UpdateBrandDto): Promise<Brand> {
        return this.brandsService.update(id, dto);
    }

    @Delete(':id')
    @HttpCode(HttpStatus.NO_CONTENT)
    async remove(@Param('id', uuidParam) id: string): Promise<void> {
        this.logger.log(`Deleting brand ${id}`);
        const deleted = await this.brandsService.remove(id);
        if (!deleted) {
            throw new BrandNotFoundError(id);
        }
    }
}
