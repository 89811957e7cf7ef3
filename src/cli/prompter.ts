import inquirer from 'inquirer';

/**
 * Source of operator answers. Questions are asked one at a time, in order.
 */
export interface Prompter {
  input(message: string): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

export class InquirerPrompter implements Prompter {
  async input(message: string): Promise<string> {
    const { value } = await inquirer.prompt<{ value: string }>([{
      type: 'input',
      name: 'value',
      message,
    }]);
    return value;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{
      type: 'confirm',
      name: 'confirmed',
      message,
      default: defaultValue,
    }]);
    return confirmed;
  }
}
