import prompts from 'prompts';

/**
 * Asks whether unselected entries belong in the tree section.
 * Resolves to null when the operator cancels.
 */
export async function confirmIncludeUnselected(): Promise<boolean | null> {
  const response = await prompts({
    type: 'select',
    name: 'includeUnselected',
    message: 'Show unselected entries in the tree section?',
    choices: [
      { title: 'No, selected entries only', value: false },
      { title: 'Yes, mark them as unselected', value: true },
    ],
    initial: 0,
  });

  const answer: unknown = response.includeUnselected;
  return typeof answer === 'boolean' ? answer : null;
}
