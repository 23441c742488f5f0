import {
  Body,
  Controller,
  Delete,
  Get,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import { ChatService } from './chat.service';
import {
  ChatRequestDto,
  ChatRequestSchema,
  ChatResponseDto,
  OneShotRequestDto,
  OneShotRequestSchema,
} from './dto/chat-request.dto';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';

export const CHAT_FAILURE_MESSAGE =
  "Sorry, I couldn't generate a response at this time.";
export const MODELS_FAILURE_MESSAGE = 'Failed to fetch model list';

/**
 * Chat Controller for talking to the local language model.
 *
 * Endpoints:
 * - POST /chat: Reply using the user's conversation memory
 * - POST /chat/message: One-off reply without memory
 * - DELETE /chat/:userId/history: Forget a user's conversation
 * - GET /chat/models: List installed models
 */
@Controller('chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  @Post()
  async chat(
    @Body(new ZodValidationPipe(ChatRequestSchema)) body: ChatRequestDto,
  ): Promise<ChatResponseDto> {
    this.logger.log(`Chat request received from user ${body.userId}`);
    try {
      const response = await this.chatService.chatTurn(
        body.userId,
        body.message,
      );
      return { response };
    } catch (error) {
      this.logger.error(`Chat error for user ${body.userId}: ${error}`);
      throw new HttpException(CHAT_FAILURE_MESSAGE, HttpStatus.BAD_GATEWAY);
    }
  }

  @Post('message')
  async message(
    @Body(new ZodValidationPipe(OneShotRequestSchema)) body: OneShotRequestDto,
  ): Promise<ChatResponseDto> {
    this.logger.log('One-off message request received');
    try {
      const response = await this.chatService.oneShot(body.message);
      return { response };
    } catch (error) {
      this.logger.error(`One-off message error: ${error}`);
      throw new HttpException(CHAT_FAILURE_MESSAGE, HttpStatus.BAD_GATEWAY);
    }
  }

  @Delete(':userId/history')
  async clearHistory(
    @Param('userId') userId: string,
  ): Promise<{ cleared: true }> {
    await this.chatService.clearHistory(userId);
    return { cleared: true };
  }

  @Get('models')
  async listModels(): Promise<{ models: string[] }> {
    try {
      const models = await this.chatService.listModels();
      return { models };
    } catch (error) {
      this.logger.error(`Error listing models: ${error}`);
      throw new HttpException(MODELS_FAILURE_MESSAGE, HttpStatus.BAD_GATEWAY);
    }
  }
}
