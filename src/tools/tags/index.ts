export {
  type AddTagInput,
  AddTagInputSchema,
  type AddTagResult,
  addTag,
} from "./add";
export {
  getTagsByCategory,
  type TagsByCategoryInput,
  TagsByCategoryInputSchema,
} from "./category";
export {
  type SearchTagsInput,
  SearchTagsInputSchema,
  searchTags,
} from "./search";
export { type TagView, toTagView } from "./view";
