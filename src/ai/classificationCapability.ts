import { ClassificationCapability } from '../types/capabilities';
import { CapabilityError, errorMessage } from '../core/errors';
import { isOpenAIConfigured, requestOpenAIText } from './openaiClient';

const CLASSIFY_SYSTEM_PROMPT = [
    'You are a strict classifier.',
    'Answer with exactly one label from the list you are given, copied verbatim.',
    'No explanation, no punctuation, no quotes.',
].join(' ');

const GENERATE_SYSTEM_PROMPT = [
    'You fill in job application forms on behalf of a candidate.',
    'Answer concisely and truthfully using only the candidate data provided.',
    'When options are listed, answer with one of them verbatim.',
].join(' ');

/**
 * ClassificationCapability over an OpenAI-compatible chat endpoint.
 * Transport retries happen inside requestOpenAIText; what escapes here is final.
 */
export class OpenAIClassificationCapability implements ClassificationCapability {
    async classify(text: string, allowedLabels: readonly string[]): Promise<string> {
        this.assertConfigured('classify');
        try {
            return await requestOpenAIText({
                system: CLASSIFY_SYSTEM_PROMPT,
                user: `Labels: ${allowedLabels.join(' | ')}\n\nText:\n${text}`,
                maxOutputTokens: 20,
                temperature: 0,
            });
        } catch (error) {
            throw new CapabilityError('classify', `classify failed: ${errorMessage(error)}`, false);
        }
    }

    async generate(prompt: string): Promise<string> {
        this.assertConfigured('generate');
        try {
            return await requestOpenAIText({
                system: GENERATE_SYSTEM_PROMPT,
                user: prompt,
                maxOutputTokens: 300,
            });
        } catch (error) {
            throw new CapabilityError('generate', `generate failed: ${errorMessage(error)}`, false);
        }
    }

    private assertConfigured(operation: string): void {
        if (!isOpenAIConfigured()) {
            throw new CapabilityError(operation, 'no AI endpoint configured (OPENAI_BASE_URL / OPENAI_API_KEY)', false);
        }
    }
}
