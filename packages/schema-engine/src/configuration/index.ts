export {
  createConfiguration,
  defaultConfiguration,
  withDiscriminator,
  withNamingPolicy,
  withSnakeCaseMemberNames,
  withKebabCaseMemberNames,
} from './configuration.js';
