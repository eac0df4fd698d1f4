import { Inject, Injectable, Logger } from '@nestjs/common';
import { DOCUMENT_STORE } from '../store/store.constants';
import { DocumentStore } from '../store/interfaces/document-store.interface';
import { CreateContactMessageDto } from './dto/create-contact-message.dto';

export interface ContactMessageResponse {
  message_id: string;
  message: string;
}

@Injectable()
export class ContactService {
  private readonly logger = new Logger(ContactService.name);

  constructor(
    @Inject(DOCUMENT_STORE)
    private readonly store: DocumentStore,
  ) {}

  async submitMessage(
    dto: CreateContactMessageDto,
  ): Promise<ContactMessageResponse> {
    const messageId = await this.store.create('contactmessage', {
      name: dto.name,
      email: dto.email,
      subject: dto.subject,
      message: dto.message,
    });

    this.logger.log(`Stored contact message ${messageId}`);

    return {
      message_id: messageId,
      message: 'Thanks for reaching out!',
    };
  }
}
