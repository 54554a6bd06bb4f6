import { IsNotEmpty, IsOptional, IsString, Length } from 'class-validator';

export class CreateBrandDto {
  @IsString({ message: 'Brand name must be a string.' })
  @IsNotEmpty({ message: 'Brand name is required and cannot be empty.' })
  @Length(1, 255, { message: 'Brand name must be between 1 and 255 characters.' })
  name!: string;

  @IsString({ message: 'Logo must be a string.' })
  @Length(1, 512, { message: 'Logo must be between 1 and 512 characters.' })
  @IsOptional()
  logo?: string | null;

  @IsString({ message: 'Description must be a string.' })
  @IsOptional()
  description?: string | null;
}

export class UpdateBrandDto {
  @IsString({ message: 'Brand name must be a string.' })
  @IsNotEmpty({ message: 'Brand name cannot be empty.' })
  @Length(1, 255, { message: 'Brand name must be between 1 and 255 characters.' })
  @IsOptional()
  name?: string;

  @IsString({ message: 'Logo must be a string.' })
  @Length(1, 512, { message: 'Logo must be between 1 and 512 characters.' })
  @IsOptional()
  logo?: string | null;

  @IsString({ message: 'Description must be a string.' })
  @IsOptional()
  description?: string | null;
}
