export {
  BaseLLMComponent,
  abortReasonOf,
  type BaseLLMComponentOptions,
} from './base-llm-component';
