import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsDefined, IsObject, IsOptional, IsString } from 'class-validator';
import { JsonObject, JsonValue } from '../../common/json/json-value';

export class SessionListItemDto {
  @ApiProperty({ example: '1760571668-000000000001105328-SR-000-000000000000DEN130-44144A80' })
  sessionId!: string;
  @ApiProperty({ example: 42 }) totalEntries!: number;
  @ApiProperty({ example: 6 }) conversationTurns!: number;
  @ApiProperty({ example: 30 }) flowEngineEntries!: number;
  @ApiProperty({ example: 12 }) agentEntries!: number;
}

export class SessionListRespDto {
  @ApiProperty({ type: [SessionListItemDto] })
  sessions!: SessionListItemDto[];
}

export class LogEntryDto {
  @ApiProperty({ example: '2025-10-16T02:21:09.123Z' }) timestamp!: string;
  @ApiProperty({ enum: ['flow-engine', 'conversational-agent'] }) source!: string;
  @ApiProperty() sessionId!: string;
  @ApiProperty({ example: 'IpdOut' }) logType!: string;
  @ApiProperty({ description: 'Decoded payload; string, number, list or object' })
  content!: JsonValue;
  @ApiProperty({ nullable: true, type: String }) blockId!: string | null;
  @ApiProperty({ nullable: true, type: String }) turnId!: string | null;
  @ApiProperty({ nullable: true, type: String }) transactionId!: string | null;
  @ApiProperty({ nullable: true, type: String, example: 'user' }) role!: string | null;
  @ApiProperty({ nullable: true, type: String }) messageType!: string | null;
  @ApiProperty({ type: Object, additionalProperties: true }) metadata!: JsonObject;
  @ApiProperty() hasWaitOn!: boolean;
  @ApiProperty({ nullable: true, type: String, example: 'CALLBACK_READY' })
  waitOnValue!: string | null;
  @ApiProperty() hasError!: boolean;
  @ApiProperty({ nullable: true, type: Number, example: 503 }) errorCode!: number | null;
}

export class SessionTimelineRespDto {
  @ApiProperty() sessionId!: string;
  @ApiProperty({ type: [LogEntryDto] }) timeline!: LogEntryDto[];
}

export class ConversationTurnDto {
  @ApiProperty({ example: 'assistant' }) role!: string;
  @ApiProperty() content!: JsonValue;
  @ApiProperty() timestamp!: string;
  @ApiProperty({ enum: ['flow-engine', 'conversational-agent'] }) source!: string;
  @ApiProperty({ nullable: true, type: String }) blockId!: string | null;
  @ApiProperty({ nullable: true, type: String }) turnId!: string | null;
  @ApiProperty({ nullable: true, type: String }) transactionId!: string | null;
  @ApiProperty({ type: Object, additionalProperties: true }) metadata!: JsonObject;
}

export class ConversationSummaryDto {
  @ApiProperty() sessionId!: string;
  @ApiProperty({ type: [ConversationTurnDto] }) conversation!: ConversationTurnDto[];
  @ApiProperty() totalEntries!: number;
  @ApiProperty() flowEngineEntries!: number;
  @ApiProperty() agentEntries!: number;
}

export class TurnRefDto {
  @ApiProperty() id!: string;
  @ApiProperty() name!: string;
}

export class FlowNodeDto {
  @ApiProperty() id!: string;
  @ApiProperty() label!: string;
  @ApiProperty({ enum: ['flow-engine', 'conversational-agent'] }) type!: string;
  @ApiPropertyOptional({ type: [TurnRefDto] }) turns?: TurnRefDto[];
  @ApiPropertyOptional({ example: 'EXTCALL' }) pluginType?: string;
}

export class FlowEdgeDto {
  @ApiProperty() from!: string;
  @ApiProperty() to!: string;
  @ApiPropertyOptional() label?: string;
  @ApiProperty({ enum: ['flow-engine', 'conversational-agent'] }) type!: string;
}

export class FlowGraphDto {
  @ApiProperty({ type: [FlowNodeDto] }) nodes!: FlowNodeDto[];
  @ApiProperty({ type: [FlowEdgeDto] }) edges!: FlowEdgeDto[];
  @ApiProperty({ type: [FlowNodeDto] }) flowEngineNodes!: FlowNodeDto[];
  @ApiProperty({ type: [FlowNodeDto] }) agentNodes!: FlowNodeDto[];
}

export class LoadDatasetDto {
  @ApiProperty({
    description:
      'Flow-engine debug log: the JSON export (array of records) or the text export',
    oneOf: [{ type: 'array', items: { type: 'object' } }, { type: 'string' }],
  })
  @IsDefined()
  flowEngineLog!: JsonValue;

  @ApiProperty({
    description: 'Conversational-agent session document',
    example: { session_id: 'S-1', agents: {}, transactions: [] },
  })
  @IsObject()
  agentLog!: JsonObject;

  @ApiPropertyOptional({ description: 'Text containing the <?xml … </chain> flow definition' })
  @IsOptional()
  @IsString()
  flowXml?: string;

  @ApiPropertyOptional({
    description: 'Agent block definitions',
    type: 'array',
    items: { type: 'object' },
  })
  @IsOptional()
  agentInfra?: JsonValue;
}

export class LoadDatasetRespDto {
  @ApiProperty({ example: true }) success!: boolean;
  @ApiProperty({ type: [String] }) sessions!: string[];
  @ApiProperty({ example: 'Loaded 1 session(s)' }) message!: string;
}

export class ClearSessionsRespDto {
  @ApiProperty({ example: true }) success!: boolean;
  @ApiProperty() message!: string;
  @ApiProperty({ example: 1 }) remainingSessions!: number;
}
