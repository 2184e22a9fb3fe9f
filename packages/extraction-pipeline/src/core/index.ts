export { BasePipelineComponent } from './base-pipeline-component';
