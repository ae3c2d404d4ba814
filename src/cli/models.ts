import type {ModelInfo} from '../providers/types.js'

function modelLine(model: ModelInfo): string {
  return model.description ? `  ${model.name}  ${model.description}` : `  ${model.name}`
}

export function formatModels(provider: string, models: ModelInfo[]): string[] {
  if (models.length === 0) return [`no models returned by ${provider}`]

  const official = models.filter((model) => !model.community)
  const community = models.filter((model) => model.community)
  const lines = [`available models (${provider}):`, ...official.map(modelLine)]
  if (community.length > 0) {
    lines.push('community:', ...community.map(modelLine))
  }

  return lines
}
