import { DeepLinkModule } from '@modules/deep-link/deep-link.module';
import { EventsModule } from '@modules/events/events.module';
import { Module } from '@nestjs/common';
import { DecoderController } from './decoder.controller';

@Module({
  imports: [DeepLinkModule, EventsModule],
  controllers: [DecoderController],
})
export class GatewayModule {}
