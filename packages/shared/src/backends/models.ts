/**
 * Model Display Names
 */

const DISPLAY_NAMES: Record<string, string> = {
  // Ollama
  llama2: 'Llama 2',
  llama3: 'Llama 3',
  mistral: 'Mistral',
  codellama: 'Code Llama',
  // Hugging Face
  'DialoGPT-small': 'DialoGPT Small',
  'DialoGPT-medium': 'DialoGPT Medium',
  'DialoGPT-large': 'DialoGPT Large',
  // OpenAI
  'gpt-4': 'GPT-4',
  'gpt-4-turbo': 'GPT-4 Turbo',
  'gpt-4o': 'GPT-4o',
  'gpt-4o-mini': 'GPT-4o mini',
  'gpt-3.5-turbo': 'GPT-3.5 Turbo',
};

/**
 * Human-readable name for a model id. Hugging Face ids are matched on their
 * last path segment and Ollama ids without their tag ("llama2:13b").
 * Unknown models are shown as their id.
 */
export function modelDisplayName(model: string): string {
  const base = model.split('/').pop() ?? model;
  const untagged = base.split(':')[0];
  for (const key of [base, untagged]) {
    if (Object.hasOwn(DISPLAY_NAMES, key)) {
      return DISPLAY_NAMES[key];
    }
  }
  return base;
}
