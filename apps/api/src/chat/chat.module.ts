import { Module } from '@nestjs/common';
import { ChatController } from './chat.controller.js';

/** HTTP transport; expects `AssistantModule` to be imported by the app. */
@Module({
  controllers: [ChatController],
})
export class ChatModule {}
