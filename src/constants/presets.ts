export interface PromptPreset {
    label: string;
    prompt: string;
}

export const DEFAULT_PRESET_LABEL = 'Summarize this image';

export const PRESETS: readonly PromptPreset[] = [
    {
        label: DEFAULT_PRESET_LABEL,
        prompt: 'Summarize this image in 2-3 sentences, include the main subjects and mood.',
    },
    {
        label: 'List key objects in the scene',
        prompt: 'List all visible objects and approximate counts.',
    },
    {
        label: 'Describe colors, lighting, and mood',
        prompt: 'Describe the colors, lighting conditions and overall mood.',
    },
    {
        label: 'Explain likely context & purpose',
        prompt: 'Explain what might be happening and the likely context of the scene.',
    },
    {
        label: 'Identify potential safety concerns',
        prompt: 'List any potential safety hazards or issues visible in the scene.',
    },
    {
        label: 'Suggest social media caption (short)',
        prompt: 'Write a short, catchy social media caption with 1-2 emojis.',
    },
];

export const QUICK_ACTIONS: readonly PromptPreset[] = [
    { label: '📝 Summarize', prompt: PRESETS[0].prompt },
    { label: '🔎 Detect objects', prompt: 'List all visible objects and their probable labels.' },
    { label: '😂 Make it funny', prompt: 'Describe this image in a humorous, light-hearted way with emojis.' },
    { label: '📸 Caption', prompt: 'Suggest 3 short social-media captions (with emojis).' },
];
