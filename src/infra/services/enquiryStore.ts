import type { Enquiry, EnquiryRepository } from '../../core/ports';

export class EnquiryStore implements EnquiryRepository {
  private readonly enquiries = new Map<number, Enquiry>();
  private nextId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(applicantId: string, message: string): Promise<Enquiry> {
    const enquiry: Enquiry = {
      id: this.nextId++,
      applicantId,
      message,
      response: null,
      responderId: null,
      createdAt: this.clock(),
    };
    this.enquiries.set(enquiry.id, enquiry);
    return enquiry;
  }

  async findById(enquiryId: number): Promise<Enquiry | null> {
    return this.enquiries.get(enquiryId) ?? null;
  }

  async list(): Promise<Enquiry[]> {
    return [...this.enquiries.values()];
  }

  async listByApplicant(applicantId: string): Promise<Enquiry[]> {
    return [...this.enquiries.values()].filter((enquiry) => enquiry.applicantId === applicantId);
  }

  async reply(enquiryId: number, responderId: string, response: string): Promise<Enquiry> {
    const enquiry = this.enquiries.get(enquiryId);
    if (!enquiry) {
      throw new Error(`Enquiry ${enquiryId} not found`);
    }
    enquiry.response = response;
    enquiry.responderId = responderId;
    return enquiry;
  }

  async delete(enquiryId: number): Promise<void> {
    this.enquiries.delete(enquiryId);
  }
}
