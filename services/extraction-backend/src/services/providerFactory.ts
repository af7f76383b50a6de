import type { PipelineConfig, ProviderName } from '../config.js'
import { createAzureReadOcr } from './azureReadProvider.js'
import { createAwsProviderClients, type AwsProviderClients } from './awsClients.js'
import { createComprehendMedicalNer } from './comprehendMedicalProvider.js'
import { createGoogleVisionOcr } from './googleVisionProvider.js'
import { createLlmEntityNer } from './llmEntityProvider.js'
import { composeAdapter, type FetchLike, type ProviderAdapter } from './providerAdapter.js'
import { createTextractOcr } from './textractProvider.js'

export type ProviderDependencies = {
  fetchImpl?: FetchLike
  awsClients?: AwsProviderClients
}

/**
 * Builds the adapter for a provider once, at startup.
 *
 * - `gcp`: Cloud Vision OCR, Gemini (OpenAI-compatible endpoint) NER
 * - `aws`: Textract OCR, Comprehend Medical NER
 * - `azure`: Document Intelligence read OCR, OpenAI-compatible chat model NER
 */
export function createProviderAdapter(
  provider: ProviderName,
  config: Pick<PipelineConfig, 'vision' | 'ner' | 'aws' | 'azure'>,
  deps: ProviderDependencies = {}
): ProviderAdapter {
  const fetchImpl = deps.fetchImpl || fetch

  switch (provider) {
    case 'gcp':
      return composeAdapter(
        provider,
        createGoogleVisionOcr(config.vision, fetchImpl),
        createLlmEntityNer(config.ner, fetchImpl)
      )
    case 'azure':
      return composeAdapter(
        provider,
        createAzureReadOcr(config.azure, fetchImpl),
        createLlmEntityNer(config.ner, fetchImpl)
      )
    case 'aws': {
      const clients = deps.awsClients || createAwsProviderClients(config.aws.region)
      return composeAdapter(
        provider,
        createTextractOcr(clients.textract),
        createComprehendMedicalNer(clients.comprehendMedical)
      )
    }
  }
}
