import { IsString } from 'class-validator';

export class EchoDto {
  @IsString({ message: 'message must be a string.' })
  message!: string;
}
