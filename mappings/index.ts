export * from './types'
export { merge_values, format_person, as_person } from './common'
export {
  INTRINSIC_MAPPINGS,
  EXTRINSIC_MAPPINGS,
  DEFAULT_FILENAME_REGISTRY,
  DEPOSIT_FORMATS,
  get_mapping,
  get_mapping_for_format,
  create_filename_registry,
  type FilenameRegistry,
} from './registry'
