import { IsNotEmpty, IsString, Length } from 'class-validator';

export class CreateDummyDto {
  @IsString({ message: 'Name must be a string.' })
  @IsNotEmpty({ message: 'Name is required and cannot be empty.' })
  @Length(1, 200, { message: 'Name must be between 1 and 200 characters.' })
  name!: string;
}

export class SearchDummyQueryDto {
  @IsString({ message: 'name must be a string.' })
  @IsNotEmpty({ message: 'name is required.' })
  name!: string;
}
