import type { Enquiry, EnquiryRepository, Logger, UserRepository } from "../../ports";
import { fail, succeed, type OperationResult } from "../../domain/errors";
import { refuse } from "../outcome";
import { resolveActor, resolveApplicant, type Session } from "../session";

export class EnquiryOrchestrator {
  constructor(
    private readonly users: UserRepository,
    private readonly enquiries: EnquiryRepository,
    private readonly logger: Logger,
  ) {}

  async submitEnquiry(session: Session, message: string): Promise<OperationResult<Enquiry>> {
    const actor = await resolveApplicant(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "submitEnquiry", session, actor);
    }
    if (!message.trim()) {
      return refuse(this.logger, "submitEnquiry", session, fail("InvalidInput", "Enquiry message is empty"));
    }

    const enquiry = await this.enquiries.create(actor.value.person.id, message.trim());
    this.logger.info({ enquiryId: enquiry.id, applicantId: enquiry.applicantId }, "Enquiry submitted");
    return succeed(enquiry);
  }

  async listMyEnquiries(session: Session): Promise<OperationResult<Enquiry[]>> {
    const actor = await resolveApplicant(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "listMyEnquiries", session, actor);
    }
    return succeed(await this.enquiries.listByApplicant(actor.value.person.id));
  }

  async deleteEnquiry(session: Session, enquiryId: number): Promise<OperationResult<Enquiry>> {
    const actor = await resolveApplicant(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, "deleteEnquiry", session, actor);
    }

    const enquiry = await this.enquiries.findById(enquiryId);
    if (!enquiry || enquiry.applicantId !== actor.value.person.id) {
      return refuse(this.logger, "deleteEnquiry", session, fail("NotFound", `Enquiry ${enquiryId} not found`));
    }

    await this.enquiries.delete(enquiryId);
    this.logger.info({ enquiryId }, "Enquiry deleted");
    return succeed(enquiry);
  }

  // Staff view: managers and officers both answer enquiries
  async listAllEnquiries(session: Session): Promise<OperationResult<Enquiry[]>> {
    const staff = await this.resolveStaff(session, "listAllEnquiries");
    if (!staff.ok) {
      return staff;
    }
    return succeed(await this.enquiries.list());
  }

  async replyEnquiry(session: Session, enquiryId: number, response: string): Promise<OperationResult<Enquiry>> {
    const staff = await this.resolveStaff(session, "replyEnquiry");
    if (!staff.ok) {
      return staff;
    }
    if (!response.trim()) {
      return refuse(this.logger, "replyEnquiry", session, fail("InvalidInput", "Reply is empty"));
    }

    const enquiry = await this.enquiries.findById(enquiryId);
    if (!enquiry) {
      return refuse(this.logger, "replyEnquiry", session, fail("NotFound", `Enquiry ${enquiryId} not found`));
    }

    const replied = await this.enquiries.reply(enquiryId, session.userId, response.trim());
    this.logger.info({ enquiryId, responderId: session.userId }, "Enquiry answered");
    return succeed(replied);
  }

  private async resolveStaff(session: Session, operation: string): Promise<OperationResult<Session>> {
    const actor = await resolveActor(this.users, session);
    if (!actor.ok) {
      return refuse(this.logger, operation, session, actor);
    }
    if (actor.value.role === "applicant") {
      return refuse(
        this.logger,
        operation,
        session,
        fail("AuthorizationDenied", "Only managers and officers can view all enquiries"),
      );
    }
    return succeed(session);
  }
}
