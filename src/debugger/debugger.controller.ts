import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBody,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiParam,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { AdminTokenGuard } from '../common/guards/admin-token.guard';
import {
  ClearSessionsRespDto,
  ConversationSummaryDto,
  FlowGraphDto,
  LoadDatasetDto,
  LoadDatasetRespDto,
  SessionListRespDto,
  SessionTimelineRespDto,
} from '../docs/dto/debugger.dto';
import { DebuggerService } from './debugger.service';

@ApiTags('debugger')
@Controller('api')
export class DebuggerController {
  constructor(private readonly svc: DebuggerService) {}

  @ApiOkResponse({ type: SessionListRespDto })
  @Get('sessions')
  sessions() {
    return { sessions: this.svc.listSessions() };
  }

  @ApiSecurity('adminToken')
  @ApiBody({ type: LoadDatasetDto })
  @ApiOkResponse({ type: LoadDatasetRespDto })
  @UseGuards(AdminTokenGuard)
  @HttpCode(200)
  @Post('sessions')
  load(@Body() body: LoadDatasetDto) {
    return this.svc.load({
      flowEngineLog: body.flowEngineLog,
      agentLog: body.agentLog,
      flowXml: body.flowXml,
      agentInfra: body.agentInfra,
    });
  }

  @ApiSecurity('adminToken')
  @ApiOkResponse({ type: ClearSessionsRespDto })
  @UseGuards(AdminTokenGuard)
  @HttpCode(200)
  @Post('sessions/clear')
  clear() {
    return this.svc.clear();
  }

  @ApiParam({ name: 'sid' })
  @ApiOkResponse({ type: SessionTimelineRespDto })
  @ApiNotFoundResponse({ description: 'Session not found' })
  @Get('session/:sid')
  timeline(@Param('sid') sid: string) {
    return this.svc.getTimeline(sid);
  }

  @ApiParam({ name: 'sid' })
  @ApiOkResponse({ type: ConversationSummaryDto })
  @ApiNotFoundResponse({ description: 'Session not found' })
  @Get('session/:sid/conversation')
  conversation(@Param('sid') sid: string) {
    return this.svc.getConversation(sid);
  }

  @ApiParam({ name: 'sid' })
  @ApiOkResponse({ type: FlowGraphDto })
  @ApiNotFoundResponse({ description: 'Session not found' })
  @Get('session/:sid/flow')
  flow(@Param('sid') sid: string) {
    return this.svc.getFlow(sid);
  }

  @ApiParam({ name: 'blockId' })
  @ApiOkResponse({ schema: { type: 'object', additionalProperties: true } })
  @ApiNotFoundResponse({ description: 'Block not found' })
  @Get('block/:blockId')
  block(@Param('blockId') blockId: string) {
    return this.svc.getBlock(blockId);
  }

  @ApiOkResponse({ schema: { type: 'array', items: { type: 'object' } } })
  @Get('infrastructure/agent')
  agentInfrastructure() {
    return this.svc.getInfrastructure().agent;
  }

  @ApiOkResponse({ schema: { example: { type: 'flow-engine-xml', rawXml: '<?xml ...' } } })
  @Get('infrastructure/flow-engine')
  flowEngineInfrastructure() {
    return this.svc.getInfrastructure().flowEngine;
  }

  @ApiOkResponse({ schema: { type: 'object', additionalProperties: true } })
  @Get('export')
  export() {
    return this.svc.export();
  }
}
