import fs from 'fs';
import path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { ApplicationOrchestrator } from '../core/application/orchestrator/ApplicationOrchestrator';
import { EnquiryOrchestrator } from '../core/application/orchestrator/EnquiryOrchestrator';
import { OfficerOrchestrator } from '../core/application/orchestrator/OfficerOrchestrator';
import { ProjectOrchestrator } from '../core/application/orchestrator/ProjectOrchestrator';
import { ReportService } from '../core/application/reports/ReportService';
import { SessionService } from '../core/application/session';
import { describeIssues } from '../core/domain/projectDraft';
import type { Config, Logger } from '../core/ports';
import { logger as rootLogger } from './logger';
import { PolicySchema, type PolicyConfig } from './config/policySchema';
import { SeedSchema, type SeedData } from './config/seedSchema';
import { ConfigImpl } from './services/Config';
import { ApplicationStore } from './services/applicationStore';
import { EnquiryStore } from './services/enquiryStore';
import { KeyedLock } from './services/keyedLock';
import { ProjectRegistry } from './services/projectRegistry';
import { buildAccounts, loadProjects } from './services/seedLoader';
import { UserDirectory } from './services/userDirectory';

export interface Repositories {
  users: UserDirectory;
  projects: ProjectRegistry;
  applications: ApplicationStore;
  enquiries: EnquiryStore;
}

export interface Workflow {
  sessions: SessionService;
  applications: ApplicationOrchestrator;
  officers: OfficerOrchestrator;
  projects: ProjectOrchestrator;
  enquiries: EnquiryOrchestrator;
  reports: ReportService;
}

export interface AppContainer {
  config: Config;
  repositories: Repositories;
  workflow: Workflow;
}

export interface ContainerOptions {
  policy: PolicyConfig;
  seed: SeedData;
  logger?: Logger;
  clock?: () => Date;
}

export interface ConfigPaths {
  policyPath: string;
  seedPath: string;
}

// Wire every store and orchestrator around one shared lock manager
export async function buildContainer({
  policy,
  seed,
  logger = rootLogger,
  clock = () => new Date(),
}: ContainerOptions): Promise<AppContainer> {
  const config: Config = new ConfigImpl(policy);
  const locks = new KeyedLock();

  const repositories: Repositories = {
    users: new UserDirectory(buildAccounts(seed)),
    projects: new ProjectRegistry(),
    applications: new ApplicationStore(clock),
    enquiries: new EnquiryStore(clock),
  };
  await loadProjects(seed, repositories.users, repositories.projects, logger);

  const { users, projects, applications, enquiries } = repositories;
  const workflow: Workflow = {
    sessions: new SessionService(users, logger),
    applications: new ApplicationOrchestrator(users, projects, applications, locks, config, logger, clock),
    officers: new OfficerOrchestrator(users, projects, applications, locks, logger),
    projects: new ProjectOrchestrator(users, projects, locks, config, logger),
    enquiries: new EnquiryOrchestrator(users, enquiries, logger),
    reports: new ReportService(users, projects, applications, logger),
  };

  logger.info(
    { users: (await users.list()).length, projects: (await projects.list()).length },
    'Application container ready',
  );
  return { config, repositories, workflow };
}

// Load policy and seed JSON relative to the working directory, then build the container
export async function buildContainerFromFiles(paths: ConfigPaths): Promise<AppContainer> {
  const policy = parseFile(PolicySchema, resolveFromRoot(paths.policyPath));
  const seed = parseFile(SeedSchema, resolveFromRoot(paths.seedPath));
  return buildContainer({ policy, seed });
}

// Validation failures are reported with the file they came from
function parseFile<T>(schema: ZodType<T, ZodTypeDef, unknown>, targetPath: string): T {
  const parsed = schema.safeParse(readJson(targetPath));
  if (!parsed.success) {
    throw new Error(`Invalid configuration in ${targetPath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

function resolveFromRoot(relative: string): string {
  return path.resolve(process.cwd(), relative);
}

function readJson(targetPath: string): unknown {
  try {
    const fileContents = fs.readFileSync(targetPath, 'utf-8');
    return JSON.parse(fileContents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read configuration file at ${targetPath}: ${reason}`);
  }
}
