import inquirer from "inquirer";
import type { ChangeSet } from "../types/index.js";

export async function confirmApply(changeSet: ChangeSet, timeoutSeconds: number): Promise<boolean> {
  const { confirm } = await inquirer.prompt([
    {
      type: "confirm",
      name: "confirm",
      message: `Apply ${changeSet.items.length} block rule(s) from "${changeSet.name}" with a ${timeoutSeconds}s rollback window?`,
      default: false,
    },
  ]);
  return confirm === true;
}

export async function confirmRecover(files: string[]): Promise<boolean> {
  const { confirm } = await inquirer.prompt([
    {
      type: "confirm",
      name: "confirm",
      message: `Restore the firewall from ${files.join(" and ")}? Current INPUT rules will be replaced.`,
      default: false,
    },
  ]);
  return confirm === true;
}
