import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ChatbotService } from './chatbot.service';
import { ChatMessageDto } from './dto/chat-message.dto';

@Controller('chatbot')
export class ChatbotController {
  constructor(private readonly chatbotService: ChatbotService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async chat(@Body() body: ChatMessageDto) {
    const { intent, text, data } =
      await this.chatbotService.classifyAndRespond(body.message);
    return { success: true, intent, response: text, data };
  }
}
