import { Body, Controller, Post } from '@nestjs/common';
import { CreateFeedbackDto } from './dto/create-feedback.dto';
import { FeedbackService } from './feedback.service';

@Controller('feedback')
export class FeedbackController {
  constructor(private readonly feedbackService: FeedbackService) {}

  @Post()
  async create(@Body() body: CreateFeedbackDto) {
    const feedback = await this.feedbackService.add(body);
    return {
      success: true,
      feedbackId: feedback.id,
      sentiment: feedback.sentiment,
      message: 'Feedback recorded successfully',
    };
  }
}
