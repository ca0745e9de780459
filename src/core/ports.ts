/**
 * Consolidated domain types and port interfaces for the housing workflow.
 * Organized into logical groupings to reduce complexity.
 */

// ==================== Domain Types ====================

export type MaritalStatus = "single" | "married";

export type FlatType = "2-Room" | "3-Room";

export const FLAT_TYPES: readonly FlatType[] = ["2-Room", "3-Room"];

export interface Person {
  id: string;
  name: string;
  age: number;
  maritalStatus: MaritalStatus;
}

export type RegistrationStatus = "none" | "pending" | "approved" | "rejected";

export interface OfficerAssignment {
  registeredProjectId: number | null;
  registrationStatus: RegistrationStatus;
  // Only set once the registration is approved
  handlingProjectId: number | null;
}

// Officers are not a subtype of applicants: they carry the same person record
// (so they can still apply and enquire) plus their own assignment record.
export type UserAccount =
  | { role: "applicant"; person: Person; credential: string }
  | { role: "officer"; person: Person; credential: string; assignment: OfficerAssignment }
  | { role: "manager"; person: Person; credential: string };

export type UserRole = UserAccount["role"];

export type OfficerAccount = Extract<UserAccount, { role: "officer" }>;

export interface FlatInventory {
  units: number;
  price: number;
  totalUnits: number;
}

export interface Project {
  id: number;
  name: string;
  neighborhood: string;
  flatTypes: Partial<Record<FlatType, FlatInventory>>;
  // ISO calendar dates (YYYY-MM-DD); the window applies only when both are set
  openDate: string | null;
  closeDate: string | null;
  managerId: string;
  visible: boolean;
  officerSlots: number;
  officerIds: string[];
}

export interface ProjectDraft {
  name: string;
  neighborhood: string;
  flatTypes: Partial<Record<FlatType, { units: number; price: number }>>;
  openDate: string | null;
  closeDate: string | null;
  managerId: string;
  officerSlots: number;
  officerIds?: string[];
}

export type ProjectPatch = Partial<Pick<Project, "name" | "neighborhood">>;

export type ApplicationStatus = "pending" | "successful" | "unsuccessful" | "booked";

export const ACTIVE_APPLICATION_STATUSES: readonly ApplicationStatus[] = ["pending", "successful"];

export interface ApplicationRecord {
  id: number;
  applicantId: string;
  projectId: number;
  flatType: FlatType;
  status: ApplicationStatus;
  withdrawalRequested: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Enquiry {
  id: number;
  applicantId: string;
  message: string;
  response: string | null;
  responderId: string | null;
  createdAt: Date;
}

// ==================== Configuration ====================

export interface EligibilityRules {
  singleMinAge: number;
  singleFlatTypes: FlatType[];
  marriedMinAge: number;
  marriedFlatTypes: FlatType[];
}

export interface LimitsConfig {
  maxOfficerSlots: number;
}

/**
 * Synchronous configuration service.
 * No async needed - config is loaded at startup and doesn't change.
 */
export interface Config {
  eligibility(): EligibilityRules;
  limits(): LimitsConfig;
}

// ==================== Data Repositories ====================

export interface UserRepository {
  findById(userId: string): Promise<UserAccount | null>;
  list(): Promise<UserAccount[]>;
  listOfficers(): Promise<OfficerAccount[]>;
  // Resolves by id first, then by display name (seed files reference either)
  resolve(idOrName: string): Promise<UserAccount | null>;
  updateAssignment(officerId: string, patch: Partial<OfficerAssignment>): Promise<OfficerAccount>;
}

/**
 * Project registry. Records are returned by reference and mutated in place.
 */
export interface ProjectRepository {
  create(draft: ProjectDraft): Promise<Project>;
  findById(projectId: number): Promise<Project | null>;
  list(): Promise<Project[]>;
  reduceUnits(projectId: number, flatType: FlatType, count: number): Promise<void>;
  toggleVisibility(projectId: number, visible: boolean): Promise<void>;
  update(projectId: number, patch: ProjectPatch): Promise<Project>;
  addOfficer(projectId: number, officerId: string): Promise<Project>;
}

export interface ApplicationRepository {
  create(applicantId: string, projectId: number, flatType: FlatType): Promise<ApplicationRecord>;
  findById(applicationId: number): Promise<ApplicationRecord | null>;
  list(): Promise<ApplicationRecord[]>;
  listByApplicant(applicantId: string): Promise<ApplicationRecord[]>;
  getActive(applicantId: string): Promise<ApplicationRecord | null>;
  update(
    applicationId: number,
    patch: Partial<Pick<ApplicationRecord, "status" | "withdrawalRequested">>,
  ): Promise<ApplicationRecord>;
}

export interface EnquiryRepository {
  create(applicantId: string, message: string): Promise<Enquiry>;
  findById(enquiryId: number): Promise<Enquiry | null>;
  list(): Promise<Enquiry[]>;
  listByApplicant(applicantId: string): Promise<Enquiry[]>;
  reply(enquiryId: number, responderId: string, response: string): Promise<Enquiry>;
  delete(enquiryId: number): Promise<void>;
}

// ==================== Concurrency ====================

/**
 * Runs check-then-act sequences one at a time per key.
 */
export interface LockManager {
  runExclusive<T>(key: string, work: () => Promise<T>): Promise<T>;
}

// ==================== Logging ====================

/**
 * Logger abstraction for infrastructure-independent logging.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}
