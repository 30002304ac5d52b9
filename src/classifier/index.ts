export {
  assessTechnical,
  isTechnicalRepository,
  classifyRepository,
  type ClassifiableRepository,
  type TechnicalAssessment,
} from './repoClassifier';
