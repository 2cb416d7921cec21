import { BadRequestException, Body, Controller, HttpCode, Inject, Logger, Post } from '@nestjs/common';
import { ApiBody, ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ConversationService } from '@timekeeper/agent';
import { InboundMessage, type ChatReply } from '@timekeeper/types';

@ApiTags('chat')
@Controller('chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    @Inject(ConversationService) private readonly conversation: Pick<ConversationService, 'dispatch'>,
  ) {}

  @Post('messages')
  @HttpCode(200)
  @ApiOperation({ summary: 'Send one chat message and get the assistant reply' })
  @ApiBody({
    schema: {
      type: 'object',
      required: ['userId', 'text'],
      properties: {
        userId: { type: 'string', example: 'user-42' },
        text: { type: 'string', example: 'Schedule a meeting with John tomorrow at 2pm for 1 hour' },
      },
    },
  })
  @ApiOkResponse({ schema: { type: 'object', properties: { reply: { type: 'string' } } } })
  async message(@Body() body: unknown): Promise<ChatReply> {
    const parsed = InboundMessage.safeParse(body);
    if (!parsed.success) {
      const problems = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
      this.logger.warn(`📥 [POST /chat/messages] rejected: ${problems.join('; ')}`);
      throw new BadRequestException(problems);
    }

    const { userId, text } = parsed.data;
    this.logger.log(`📥 [POST /chat/messages] ${userId} (${text.length} chars)`);
    const reply = await this.conversation.dispatch(userId, text);
    this.logger.log(`📤 [POST /chat/messages] ${userId} (${reply.length} chars)`);
    return { reply };
  }
}
