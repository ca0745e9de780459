import * as readline from 'readline';
import chalk from 'chalk';
import { z } from 'zod';
import type { Session } from '../core/application/session';
import type { ReportFilter } from '../core/application/reports/queries';
import type { OperationResult } from '../core/domain/errors';
import type { FlatType } from '../core/ports';
import type { AppContainer } from '../infra/container';
import { getCliContainer } from './container';
import {
  formatDate,
  formatRegistration,
  formatStatus,
  printError,
  printFailure,
  printInfo,
  printProjects,
  printSuccess,
  printTable,
  printWarning,
} from './utils/output';

// Everything a command can touch. The session is the only per-user state.
export interface ReplState {
  container: AppContainer;
  session: Session | null;
}

// Command handler interface
type CommandHandler = (args: string[], state: ReplState) => Promise<void>;
type SessionHandler = (args: string[], container: AppContainer, session: Session) => Promise<void>;

const IdArg = z.coerce.number().int().positive();
const MaritalArg = z.enum(['single', 'married']);

function parseId(raw: string | undefined): number | null {
  const parsed = IdArg.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// Accepts 2, 3, 2-Room or 3-Room in any casing
function parseFlatType(raw: string | undefined): FlatType | null {
  switch (raw?.trim().toLowerCase()) {
    case '2':
    case '2-room':
      return '2-Room';
    case '3':
    case '3-room':
      return '3-Room';
    default:
      return null;
  }
}

// Splits a command line on whitespace, keeping "double quoted" runs together
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  for (const match of line.matchAll(/"([^"]*)"|(\S+)/g)) {
    tokens.push(match[1] ?? match[2]);
  }
  return tokens;
}

function usage(text: string): void {
  printError(`Usage: ${text}`);
}

// Prints the failure, or hands the value to onSuccess
function render<T>(result: OperationResult<T>, onSuccess: (value: T) => void): void {
  if (!result.ok) {
    printFailure(result.error);
    return;
  }
  onSuccess(result.value);
}

// Wraps a handler that needs somebody logged in
const withSession =
  (handler: SessionHandler): CommandHandler =>
  async (args, state) => {
    if (!state.session) {
      printError('Log in first: login <userId> <password>');
      return;
    }
    await handler(args, state.container, state.session);
  };

// Shared shape for the approve/reject pairs that take an application id
const decideApplication = (
  usageText: string,
  decide: (container: AppContainer, session: Session, applicationId: number) => Promise<OperationResult<unknown>>,
  successText: (applicationId: number) => string,
): CommandHandler =>
  withSession(async (args, container, session) => {
    const applicationId = parseId(args[0]);
    if (applicationId === null) {
      usage(usageText);
      return;
    }
    render(await decide(container, session, applicationId), () => printSuccess(successText(applicationId)));
  });

// Handler functions for each command
const handlers: Record<string, CommandHandler> = {
  login: async (args, state) => {
    if (args.length < 2) {
      usage('login <userId> <password>');
      return;
    }
    if (state.session) {
      printWarning(`Already logged in as ${state.session.userId}; logout first`);
      return;
    }
    const result = await state.container.workflow.sessions.login(args[0], args[1]);
    if (!result.ok) {
      printFailure(result.error);
      return;
    }
    state.session = result.value;
    const account = await state.container.repositories.users.findById(result.value.userId);
    printSuccess(`Welcome, ${account?.person.name ?? result.value.userId} (${result.value.role})`);
  },

  logout: async (_args, state) => {
    if (!state.session) {
      printInfo('Not logged in');
      return;
    }
    printInfo(`Logged out ${state.session.userId}`);
    state.session = null;
  },

  whoami: withSession(async (_args, container, session) => {
    const account = await container.repositories.users.findById(session.userId);
    if (!account) {
      printError(`Account ${session.userId} no longer exists`);
      return;
    }
    const rows = [
      ['ID', account.person.id],
      ['Name', account.person.name],
      ['Role', account.role],
      ['Age', account.person.age.toString()],
      ['Marital Status', account.person.maritalStatus],
    ];
    if (account.role === 'officer') {
      const { assignment } = account;
      rows.push(
        ['Registered Project', assignment.registeredProjectId?.toString() ?? '-'],
        ['Registration', formatRegistration(assignment.registrationStatus)],
        ['Handling Project', assignment.handlingProjectId?.toString() ?? '-'],
      );
    }
    printTable(['Field', 'Value'], rows);
  }),

  projects: withSession(async (_args, container, session) => {
    render(await container.workflow.applications.listProjects(session), (projects) => {
      if (projects.length === 0) {
        printInfo('No projects available based on your eligibility and current unit availability');
        return;
      }
      printProjects(projects);
    });
  }),

  apply: withSession(async (args, container, session) => {
    const projectId = parseId(args[0]);
    const flatType = parseFlatType(args[1]);
    if (projectId === null || flatType === null) {
      usage('apply <projectId> <2|3>');
      return;
    }
    render(await container.workflow.applications.apply(session, projectId, flatType), (application) =>
      printSuccess(`Application #${application.id} for ${flatType} submitted (pending)`),
    );
  }),

  status: withSession(async (_args, container, session) => {
    render(await container.workflow.applications.viewStatus(session), (views) => {
      if (views.length === 0) {
        printInfo('You have no applications');
        return;
      }
      printTable(
        ['ID', 'Project', 'Flat Type', 'Status', 'Withdrawal Requested'],
        views.map(({ application, projectName }) => [
          application.id.toString(),
          projectName,
          application.flatType,
          formatStatus(application.status),
          application.withdrawalRequested ? 'yes' : 'no',
        ]),
      );
    });
  }),

  withdraw: withSession(async (args, container, session) => {
    const applicationId = parseId(args[0]);
    if (applicationId === null) {
      usage('withdraw <applicationId>');
      return;
    }
    render(await container.workflow.applications.requestWithdrawal(session, applicationId), () =>
      printSuccess(`Withdrawal requested for application #${applicationId}; awaiting manager approval`),
    );
  }),

  'enquiry:submit': withSession(async (args, container, session) => {
    render(await container.workflow.enquiries.submitEnquiry(session, args.join(' ')), (enquiry) =>
      printSuccess(`Enquiry #${enquiry.id} submitted`),
    );
  }),

  'enquiry:list': withSession(async (_args, container, session) => {
    render(await container.workflow.enquiries.listMyEnquiries(session), (enquiries) => {
      if (enquiries.length === 0) {
        printInfo('You have no enquiries');
        return;
      }
      printTable(
        ['ID', 'Submitted', 'Message', 'Response'],
        enquiries.map((enquiry) => [
          enquiry.id.toString(),
          formatDate(enquiry.createdAt),
          enquiry.message,
          enquiry.response ?? '-',
        ]),
      );
    });
  }),

  'enquiry:delete': withSession(async (args, container, session) => {
    const enquiryId = parseId(args[0]);
    if (enquiryId === null) {
      usage('enquiry delete <enquiryId>');
      return;
    }
    render(await container.workflow.enquiries.deleteEnquiry(session, enquiryId), () =>
      printSuccess(`Enquiry #${enquiryId} deleted`),
    );
  }),

  'enquiry:all': withSession(async (_args, container, session) => {
    render(await container.workflow.enquiries.listAllEnquiries(session), (enquiries) => {
      if (enquiries.length === 0) {
        printInfo('No enquiries');
        return;
      }
      printTable(
        ['ID', 'From', 'Submitted', 'Message', 'Response'],
        enquiries.map((enquiry) => [
          enquiry.id.toString(),
          enquiry.applicantId,
          formatDate(enquiry.createdAt),
          enquiry.message,
          enquiry.response ?? '-',
        ]),
      );
    });
  }),

  'enquiry:reply': withSession(async (args, container, session) => {
    const enquiryId = parseId(args[0]);
    if (enquiryId === null || args.length < 2) {
      usage('enquiry reply <enquiryId> <response...>');
      return;
    }
    render(await container.workflow.enquiries.replyEnquiry(session, enquiryId, args.slice(1).join(' ')), () =>
      printSuccess(`Replied to enquiry #${enquiryId}`),
    );
  }),

  'project:create': withSession(async (args, container, session) => {
    if (args.length < 9) {
      usage('project create <name> <neighborhood> <2R units> <2R price> <3R units> <3R price> <open|-> <close|-> <slots>');
      return;
    }
    const [name, neighborhood, twoUnits, twoPrice, threeUnits, threePrice, open, close, slots] = args;
    // Numbers are passed through as-is; the project schema rejects anything that is not a whole number
    const result = await container.workflow.projects.createProject(session, {
      name,
      neighborhood,
      flatTypes: {
        '2-Room': { units: Number(twoUnits), price: Number(twoPrice) },
        '3-Room': { units: Number(threeUnits), price: Number(threePrice) },
      },
      openDate: open === '-' ? null : open,
      closeDate: close === '-' ? null : close,
      officerSlots: Number(slots),
    });
    render(result, (project) => printSuccess(`Project #${project.id} "${project.name}" created`));
  }),

  'project:edit': withSession(async (args, container, session) => {
    const projectId = parseId(args[0]);
    if (projectId === null || args.length < 3) {
      usage('project edit <projectId> <name|-> <neighborhood|->');
      return;
    }
    const patch = {
      name: args[1] === '-' ? undefined : args[1],
      neighborhood: args[2] === '-' ? undefined : args[2],
    };
    render(await container.workflow.projects.editProject(session, projectId, patch), (project) =>
      printSuccess(`Project #${project.id} updated: ${project.name}, ${project.neighborhood}`),
    );
  }),

  'project:visibility': withSession(async (args, container, session) => {
    const projectId = parseId(args[0]);
    const flag = args[1]?.toLowerCase();
    if (projectId === null || (flag !== 'on' && flag !== 'off')) {
      usage('project visibility <projectId> <on|off>');
      return;
    }
    render(await container.workflow.projects.toggleVisibility(session, projectId, flag === 'on'), (project) =>
      printSuccess(`Project "${project.name}" is now ${project.visible ? 'visible' : 'hidden'}`),
    );
  }),

  'officer:register': withSession(async (args, container, session) => {
    const projectId = parseId(args[0]);
    if (projectId === null) {
      usage('officer register <projectId>');
      return;
    }
    render(await container.workflow.officers.registerOfficer(session, projectId), () =>
      printSuccess(`Registration to handle project #${projectId} submitted (pending)`),
    );
  }),

  'officer:lookup': withSession(async (args, container, session) => {
    if (args.length < 1) {
      usage('officer lookup <applicantId>');
      return;
    }
    render(await container.workflow.officers.retrieveApplication(session, args[0]), (application) =>
      printTable(
        ['ID', 'Applicant', 'Flat Type', 'Status', 'Withdrawal Requested'],
        [
          [
            application.id.toString(),
            application.applicantId,
            application.flatType,
            formatStatus(application.status),
            application.withdrawalRequested ? 'yes' : 'no',
          ],
        ],
      ),
    );
  }),

  'officer:book': decideApplication(
    'officer book <applicationId>',
    (container, session, applicationId) => container.workflow.applications.bookFlat(session, applicationId),
    (applicationId) => `Flat booked for application #${applicationId}`,
  ),

  'officer:units': withSession(async (args, container, session) => {
    const flatType = parseFlatType(args[0]);
    if (flatType === null || args.length < 2) {
      usage('officer units <2|3> <unitsBooked>');
      return;
    }
    render(await container.workflow.officers.updateFlatAvailability(session, flatType, Number(args[1])), (project) =>
      printSuccess(`${flatType} units left in ${project.name}: ${project.flatTypes[flatType]?.units ?? 0}`),
    );
  }),

  'officer:receipt': withSession(async (args, container, session) => {
    if (args.length < 1) {
      usage('officer receipt <applicantId>');
      return;
    }
    render(await container.workflow.applications.generateReceipt(session, args[0]), (receipt) => {
      console.log('\n=== Flat Booking Receipt ===\n');
      printTable(
        ['Field', 'Value'],
        [
          ['Applicant Name', receipt.applicantName],
          ['NRIC', receipt.applicantId],
          ['Age', receipt.age.toString()],
          ['Marital Status', receipt.maritalStatus],
          ['Project', receipt.projectName],
          ['Neighborhood', receipt.neighborhood],
          ['Flat Type', receipt.flatType],
          ['Price', receipt.price.toString()],
        ],
      );
    });
  }),

  'manager:applications': withSession(async (_args, container, session) => {
    render(await container.workflow.reports.pendingApplications(session), (items) => {
      if (items.length === 0) {
        printInfo('No pending applications for your projects');
        return;
      }
      printTable(
        ['ID', 'Applicant', 'Project', 'Flat Type'],
        items.map(({ application, applicantName, projectName }) => [
          application.id.toString(),
          applicantName,
          projectName,
          application.flatType,
        ]),
      );
    });
  }),

  'manager:approve': decideApplication(
    'manager approve <applicationId>',
    (container, session, applicationId) => container.workflow.applications.approveApplication(session, applicationId),
    (applicationId) => `Application #${applicationId} approved`,
  ),

  'manager:reject': decideApplication(
    'manager reject <applicationId>',
    (container, session, applicationId) => container.workflow.applications.rejectApplication(session, applicationId),
    (applicationId) => `Application #${applicationId} rejected`,
  ),

  'manager:withdrawals': withSession(async (_args, container, session) => {
    render(await container.workflow.reports.withdrawalRequests(session), (items) => {
      if (items.length === 0) {
        printInfo('No withdrawal requests');
        return;
      }
      printTable(
        ['ID', 'Applicant', 'Project', 'Status'],
        items.map(({ application, applicantName, projectName }) => [
          application.id.toString(),
          applicantName,
          projectName,
          formatStatus(application.status),
        ]),
      );
    });
  }),

  'manager:approve-withdrawal': decideApplication(
    'manager approve-withdrawal <applicationId>',
    (container, session, applicationId) => container.workflow.applications.approveWithdrawal(session, applicationId),
    (applicationId) => `Withdrawal approved; application #${applicationId} is now unsuccessful`,
  ),

  'manager:reject-withdrawal': decideApplication(
    'manager reject-withdrawal <applicationId>',
    (container, session, applicationId) => container.workflow.applications.rejectWithdrawal(session, applicationId),
    (applicationId) => `Withdrawal request for application #${applicationId} rejected`,
  ),

  'manager:officers': withSession(async (_args, container, session) => {
    render(await container.workflow.reports.pendingOfficerRegistrations(session), (items) => {
      if (items.length === 0) {
        printInfo('No pending officer registrations');
        return;
      }
      printTable(
        ['Officer ID', 'Name', 'Project'],
        items.map((item) => [item.officerId, item.officerName, item.projectName]),
      );
    });
  }),

  'manager:approve-officer': withSession(async (args, container, session) => {
    if (args.length < 1) {
      usage('manager approve-officer <officerId>');
      return;
    }
    render(await container.workflow.officers.approveOfficerRegistration(session, args[0]), (officer) =>
      printSuccess(`Officer ${officer.person.name} approved for project #${officer.assignment.handlingProjectId}`),
    );
  }),

  'manager:reject-officer': withSession(async (args, container, session) => {
    if (args.length < 1) {
      usage('manager reject-officer <officerId>');
      return;
    }
    render(await container.workflow.officers.rejectOfficerRegistration(session, args[0]), (officer) =>
      printSuccess(`Officer ${officer.person.name} rejected`),
    );
  }),

  'manager:report': withSession(async (args, container, session) => {
    const filter: ReportFilter = {};
    for (let i = 0; i < args.length; i += 2) {
      const value = args[i + 1];
      const flatType = parseFlatType(value);
      const projectId = parseId(value);
      const marital = MaritalArg.safeParse(value?.toLowerCase());
      if (args[i] === '--flat-type' && flatType) {
        filter.flatType = flatType;
      } else if (args[i] === '--project' && projectId !== null) {
        filter.projectId = projectId;
      } else if (args[i] === '--marital' && marital.success) {
        filter.maritalStatus = marital.data;
      } else {
        usage('manager report [--flat-type 2|3] [--project <id>] [--marital single|married]');
        return;
      }
    }

    render(await container.workflow.reports.generateReport(session, filter), (rows) => {
      console.log('\n=== Applicant Report (Booked Applications) ===\n');
      if (rows.length === 0) {
        printInfo('No booked applications match');
        return;
      }
      printTable(
        ['Applicant', 'NRIC', 'Age', 'Marital Status', 'Project', 'Flat Type'],
        rows.map((row) => [
          row.applicantName,
          row.applicantId,
          row.age.toString(),
          row.maritalStatus,
          row.projectName,
          row.flatType,
        ]),
      );
    });
  }),
};

function printHelp(): void {
  console.log(`
${chalk.cyan('BTO Portal Interactive Mode')}

${chalk.yellow('Session:')}
  login <userId> <password>       - Start a session
  logout                          - End the session
  whoami                          - Show your account

${chalk.yellow('Applicant Commands (applicants and officers):')}
  projects                        - List projects open to you
  apply <projectId> <2|3>         - Apply for a 2-Room or 3-Room flat
  status                          - View your applications
  withdraw <applicationId>        - Request withdrawal of an application
  enquiry submit <message...>     - Submit an enquiry
  enquiry list                    - View your enquiries
  enquiry delete <enquiryId>      - Delete one of your enquiries

${chalk.yellow('Officer Commands:')}
  officer register <projectId>    - Register to handle a project
  officer lookup <applicantId>    - Find an applicant's application in your project
  officer book <applicationId>    - Book a flat for a successful application
  officer units <2|3> <count>     - Record units booked outside the portal
  officer receipt <applicantId>   - Print a booking receipt
  enquiry all                     - View all enquiries
  enquiry reply <id> <text...>    - Reply to an enquiry

${chalk.yellow('Manager Commands:')}
  project create <name> <neighborhood> <2R units> <2R price> <3R units> <3R price> <open|-> <close|-> <slots>
  project edit <projectId> <name|-> <neighborhood|->
  project visibility <projectId> <on|off>
  manager applications            - Pending applications for your projects
  manager approve|reject <applicationId>
  manager withdrawals             - Withdrawal requests for your projects
  manager approve-withdrawal|reject-withdrawal <applicationId>
  manager officers                - Pending officer registrations
  manager approve-officer|reject-officer <officerId>
  manager report [--flat-type 2|3] [--project <id>] [--marital single|married]

${chalk.yellow('Other Commands:')}
  help                            - Show this help message
  exit                            - Exit the CLI
  `);
}

/**
 * Runs one command line against the state. Resolves to false when the
 * session driver should stop reading input.
 */
export async function dispatch(line: string, state: ReplState): Promise<boolean> {
  const parts = tokenize(line.trim());
  if (parts.length === 0) {
    return true;
  }

  const [command, subcommand] = parts;
  if (command === 'exit' || command === 'quit') {
    return false;
  }
  if (command === 'help') {
    printHelp();
    return true;
  }

  // Convert command format (e.g., "manager approve" -> "manager:approve")
  const nested = subcommand ? handlers[`${command}:${subcommand}`] : undefined;
  const handler = nested ?? handlers[command];
  if (!handler) {
    printError(`Unknown command: ${line.trim()}`);
    console.log(chalk.dim('Type "help" for available commands'));
    return true;
  }

  try {
    await handler(parts.slice(nested ? 2 : 1), state);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    printError(`Error: ${reason}`);
  }
  return true;
}

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  state?: ReplState;
}

export async function startREPL(options: ReplOptions = {}): Promise<void> {
  const state: ReplState = options.state ?? { container: await getCliContainer(), session: null };

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    prompt: chalk.green('bto> '),
  });

  console.log(chalk.cyan('\nBTO Portal - Interactive Mode'));
  console.log(chalk.dim('Type "help" for available commands or "exit" to quit\n'));

  // Lines are queued so a pasted batch of commands runs in order
  let queue = Promise.resolve();
  // Lines queued behind "exit" are dropped
  let exited = false;
  let closed = false;

  return new Promise<void>((resolve) => {
    rl.on('line', (line: string) => {
      queue = queue.then(async () => {
        if (exited) {
          return;
        }
        const keepGoing = await dispatch(line, state);
        if (!keepGoing) {
          exited = true;
          rl.close();
        } else if (!closed) {
          rl.prompt();
        }
      });
    });

    // End of input still lets queued lines finish
    rl.on('close', () => {
      closed = true;
      queue = queue.then(() => {
        console.log(chalk.dim('Goodbye!'));
        resolve();
      });
    });

    rl.prompt();
  });
}
