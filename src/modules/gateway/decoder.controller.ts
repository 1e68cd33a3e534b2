import { JsonRpcApiEntry } from '@common/json-rpc/json-rpc-api-entry.decorator';
import { DeepLinkService } from '@modules/deep-link/deep-link.service';
import { LinkParseResult } from '@modules/deep-link/deep-link.types';
import { EventInterpretation } from '@modules/events/event-interpreter';
import { EventInterpreterService } from '@modules/events/event-interpreter.service';
import { Body, Controller } from '@nestjs/common';
import { InterpretEventDto, ParseLinkDto } from './dto';

/**
 * JSON-RPC entries for the decoders. Amounts are serialized as strings.
 */
@Controller('decoder')
export class DecoderController {
  constructor(
    private readonly deepLinkService: DeepLinkService,
    private readonly eventInterpreterService: EventInterpreterService,
  ) {}

  @JsonRpcApiEntry({ path: 'link' })
  public parseLink(@Body() dto: ParseLinkDto): LinkParseResult {
    return this.deepLinkService.parse(dto.link);
  }

  @JsonRpcApiEntry({ path: 'event' })
  public interpretEvent(@Body() dto: InterpretEventDto): EventInterpretation {
    return this.eventInterpreterService.interpret(dto.event, dto.wallet);
  }
}
