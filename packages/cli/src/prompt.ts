import inquirer from "inquirer";

/** Masked interactive prompt for the OIDC client secret */
export async function promptSecret(message: string): Promise<string> {
  const { secret } = await inquirer.prompt<{ secret: string }>([
    {
      type: "password",
      name: "secret",
      message,
      mask: "*",
    },
  ]);
  return secret;
}
