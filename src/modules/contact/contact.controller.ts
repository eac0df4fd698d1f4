import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ContactMessageResponse, ContactService } from './contact.service';
import { CreateContactMessageDto } from './dto/create-contact-message.dto';

/**
 * Endpoints:
 * - POST /api/contact - Submit the contact form
 */
@Controller('contact')
export class ContactController {
  constructor(private readonly contactService: ContactService) {}

  /**
   * Response 201: { "message_id": "64a7b8c9d0e1f2a3b4c5d6e9", "message": "Thanks for reaching out!" }
   * Error 400: Validation failed
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async submitMessage(
    @Body() dto: CreateContactMessageDto,
  ): Promise<ContactMessageResponse> {
    return this.contactService.submitMessage(dto);
  }
}
