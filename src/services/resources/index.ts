export { createResourcesService } from './service';
