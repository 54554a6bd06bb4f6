import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SkipThrottle } from '@nestjs/throttler';
import { EchoDto } from './dto/echo.dto';

const DEFAULT_VERSION = '1.0.0';

@Controller()
export class AppController {
    constructor(private readonly configService: ConfigService) {}

    @SkipThrottle()
    @Get('health')
    health(): { status: 'ok'; version: string } {
        return { status: 'ok', version: this.configService.get<string>('APP_VERSION') || DEFAULT_VERSION };
    }

    @Post('echo')
    @HttpCode(HttpStatus.OK)
    echo(@Body() dto: EchoDto): { message: string } {
        return { message: dto.message };
    }
}
