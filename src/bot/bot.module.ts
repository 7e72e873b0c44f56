import { Module } from '@nestjs/common';
import { BotController } from './bot.controller';
import { BotService } from './bot.service';
import { LineAdapter } from './adapters/line.adapter';
import { LineSignatureGuard } from './guards/line-signature.guard';
import { WeatherModule } from '../weather/weather.module';

@Module({
  imports: [WeatherModule],
  controllers: [BotController],
  providers: [BotService, LineAdapter, LineSignatureGuard],
})
export class BotModule {}
