import { Command } from 'commander';
import { getCliContainer } from '../container';
import { printTable, printError } from '../utils/output';

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Configuration viewing');

  configCmd
    .command('show')
    .description('Display the eligibility policy and limits in effect')
    .action(async () => {
      try {
        const { config } = await getCliContainer();

        console.log('\n=== Current Configuration ===\n');

        const rules = config.eligibility();
        console.log('Eligibility:');
        printTable(
          ['Marital Status', 'Minimum Age', 'Flat Types'],
          [
            ['Single', rules.singleMinAge.toString(), rules.singleFlatTypes.join(', ') || 'None'],
            ['Married', rules.marriedMinAge.toString(), rules.marriedFlatTypes.join(', ') || 'None'],
          ],
        );

        const limits = config.limits();
        console.log('\nLimits:');
        printTable(['Setting', 'Value'], [['Max Officer Slots', limits.maxOfficerSlots.toString()]]);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        printError(`Failed to show config: ${reason}`);
        process.exit(1);
      }
    });
}
