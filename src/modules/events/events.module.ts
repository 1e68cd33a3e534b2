import { Module } from '@nestjs/common';
import { EventInterpreterService } from './event-interpreter.service';
import { EventsConfig } from './events.config';

@Module({
  providers: [EventsConfig, EventInterpreterService],
  exports: [EventInterpreterService],
})
export class EventsModule {}
