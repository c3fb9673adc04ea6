import inquirer from "inquirer";

/**
 * Ask the operator to paste the code shown after authorizing in the browser.
 */
export async function promptForAuthCode(): Promise<string> {
  const { code } = await inquirer.prompt<{ code: string }>([
    {
      type: "input",
      name: "code",
      message: "Enter auth code:",
      validate: (input: string) => (input.trim() ? true : "Auth code is required"),
    },
  ]);
  return code;
}
