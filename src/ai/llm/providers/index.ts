export { OpenAIClient, OPENAI_API_URL } from './OpenAIClient';
