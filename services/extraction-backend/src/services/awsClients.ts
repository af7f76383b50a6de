import { DetectDocumentTextCommand, TextractClient } from '@aws-sdk/client-textract'
import { ComprehendMedicalClient, DetectEntitiesV2Command } from '@aws-sdk/client-comprehendmedical'
import type { TextractClientLike } from './textractProvider.js'
import type { ComprehendMedicalClientLike } from './comprehendMedicalProvider.js'

export type AwsProviderClients = {
  textract: TextractClientLike
  comprehendMedical: ComprehendMedicalClientLike
}

// Credentials come from the default AWS provider chain (env, shared profile, role).
export function createAwsProviderClients(region: string): AwsProviderClients {
  const textract = new TextractClient({ region })
  const comprehendMedical = new ComprehendMedicalClient({ region })

  return {
    textract: {
      detectDocumentText: (document, signal) => textract.send(
        new DetectDocumentTextCommand({ Document: { Bytes: document } }),
        { abortSignal: signal }
      )
    },
    comprehendMedical: {
      detectEntities: (text, signal) => comprehendMedical.send(
        new DetectEntitiesV2Command({ Text: text }),
        { abortSignal: signal }
      )
    }
  }
}
