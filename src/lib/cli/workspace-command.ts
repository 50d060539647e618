import { z } from 'zod';
import { pageTitle, type WorkspaceAdmin } from '../api/workspace';

const commandSchema = z.object({
  db: z.string({ required_error: '--db is required' }).trim().min(1, '--db is required'),
  action: z.enum(['view', 'update', 'add_prop', 'remove_prop', 'filter']).default('view'),
  page: z.string().optional(),
  text: z.string().optional(),
  prop_name: z.string().optional(),
  prop_type: z.enum(['text', 'number', 'checkbox', 'select', 'date']).optional(),
  default_value: z.string().optional(),
  filter_prop: z.string().optional(),
  filter_value: z.string().optional(),
  filter_type: z.enum(['equals', 'contains', 'greater_than', 'less_than']).default('equals'),
});

export type WorkspaceCommand = z.infer<typeof commandSchema>;

type Print = (line: string) => void;

type CommandAdmin = Pick<
  WorkspaceAdmin,
  'findDatabaseByName' | 'getDatabaseContent' | 'renderPage' | 'fillEmptyText' | 'addProperty' | 'removeProperty' | 'filter'
>;

/** Collects `--flag value` pairs; a flag without a value is ignored. */
export function collectFlags(argv: readonly string[]): Record<string, string> {
  const flags: Record<string, string> = {};
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token.startsWith('--')) {
      continue;
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      continue;
    }
    flags[token.slice(2)] = value;
    index += 1;
  }
  return flags;
}

export function parseWorkspaceCommand(argv: readonly string[]): WorkspaceCommand {
  return commandSchema.parse(collectFlags(argv));
}

function toDefaultValue(command: WorkspaceCommand): string | boolean | undefined {
  if (command.default_value === undefined) {
    return undefined;
  }
  if (command.prop_type === 'checkbox') {
    return command.default_value.trim().toLowerCase() === 'true';
  }
  return command.default_value;
}

/** Runs one CLI action and returns the process exit code. */
export async function runWorkspaceCommand(
  command: WorkspaceCommand,
  admin: CommandAdmin,
  print: Print,
): Promise<number> {
  const databaseId = await admin.findDatabaseByName(command.db);
  if (!databaseId) {
    print(`Database not found: ${command.db}`);
    return 1;
  }

  switch (command.action) {
    case 'view': {
      if (command.page) {
        const markdown = await admin.renderPage(databaseId, command.page);
        if (markdown === null) {
          print(`No page titled '${command.page}'`);
          return 1;
        }
        print(`Page '${command.page}':`);
        print(markdown);
        return 0;
      }
      const pages = await admin.getDatabaseContent(databaseId);
      print(`Database content (${pages.length} entries):`);
      pages.forEach((page) => print(`- ${pageTitle(page)}`));
      return 0;
    }
    case 'update': {
      if (!command.text) {
        print('update needs --text');
        return 1;
      }
      const result = await admin.fillEmptyText({ database_id: databaseId, text_content: command.text });
      if (result.candidates === 0) {
        print('No pages need updating');
        return 0;
      }
      print(`Updated ${result.successCount} of ${result.candidates} pages`);
      return result.successCount === result.candidates ? 0 : 1;
    }
    case 'add_prop': {
      if (!command.prop_name || !command.prop_type) {
        print('add_prop needs --prop_name and --prop_type');
        return 1;
      }
      const added = await admin.addProperty({
        database_id: databaseId,
        property_name: command.prop_name,
        property_type: command.prop_type,
        default_value: toDefaultValue(command),
      });
      print(added ? `Added property: ${command.prop_name}` : `Failed to add property: ${command.prop_name}`);
      return added ? 0 : 1;
    }
    case 'remove_prop': {
      if (!command.prop_name) {
        print('remove_prop needs --prop_name');
        return 1;
      }
      const removed = await admin.removeProperty(databaseId, command.prop_name);
      print(removed ? `Removed property: ${command.prop_name}` : `Failed to remove property: ${command.prop_name}`);
      return removed ? 0 : 1;
    }
    case 'filter': {
      if (!command.filter_prop || command.filter_value === undefined) {
        print('filter needs --filter_prop and --filter_value');
        return 1;
      }
      const pages = await admin.filter({
        database_id: databaseId,
        filter_property: command.filter_prop,
        filter_value: command.filter_value,
        filter_type: command.filter_type,
      });
      print(`Filter results (${pages.length} entries):`);
      pages.forEach((page) => print(`- ${pageTitle(page)}`));
      return 0;
    }
  }
}
