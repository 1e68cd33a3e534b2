import { Injectable, Logger } from '@nestjs/common';
import {
  EventInterpretation,
  interpretEvent,
} from './event-interpreter';
import { EventsConfig } from './events.config';
import { ScamDenylist } from './scam-denylist';

@Injectable()
export class EventInterpreterService {
  private readonly logger = new Logger(EventInterpreterService.name);

  private readonly denylist: ScamDenylist;

  constructor(config: EventsConfig) {
    this.denylist = new ScamDenylist(config.scamSymbolPatterns);
    this.logger.log(`Scam denylist loaded with ${this.denylist.size} patterns`);
  }

  public interpret(event: unknown, wallet?: string): EventInterpretation {
    const result = interpretEvent(event, wallet, { denylist: this.denylist });

    if (result.warning) {
      this.logger.warn(`Event interpretation failed: ${result.warning}`);
    } else if (result.isScamRisk) {
      this.logger.warn(
        `Scam risk event from ${result.sender}: ${result.description}`,
      );
    }

    return result;
  }
}
