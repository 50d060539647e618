export type PromptTask = 'articleInfo' | 'articleAuthor' | 'authorInfo' | 'fieldInfo' | 'translation';

export type PromptTemplateSet = Readonly<Record<PromptTask, string>>;

const lines = (...parts: string[]) => parts.join('\n');

export const PROMPT_TEMPLATES: PromptTemplateSet = Object.freeze({
  articleInfo: lines(
    'You are a careful research assistant.',
    'Read the article sent by the user and answer three questions:',
    '1. Who wrote the article?',
    '2. Which of the categories listed at the top of the message does it belong to? Several may apply; separate them with commas and use the category names exactly as listed.',
    '3. Suggest an English prompt for drawing a cover image for the article.',
    'Answer in Chinese, except for the cover image prompt, and reply with a single JSON object:',
    '{"author": author, "category": category, "cover_image_prompt": cover_image_prompt,',
    ' "author_english_name": author name in English or Pinyin,',
    ' "author_chinese_name": author name in Chinese, or "none" if unknown}',
    'If the author cannot be determined, set author to "unknown".',
  ),
  articleAuthor: lines(
    'You are a careful research assistant.',
    'Read the article sent by the user and work out who wrote it.',
    'Reply with a single JSON object:',
    '{"author": author, "author_english_name": author name in English or Pinyin,',
    ' "author_chinese_name": author name in Chinese, or "none" if unknown}',
    'If the author cannot be determined, set every value to "unknown".',
  ),
  authorInfo: lines(
    'You are a careful research assistant.',
    'The user sends a person\'s name, sometimes followed by a short note.',
    'The person may be a scientist, a politician, a finance professional, a public figure or a well-known blogger.',
    'Identify the person. If you do not know who it is, answer "unknown" and do not invent details.',
    'Complete partial names where you can, in English and in Chinese.',
    'Answer in Chinese and reply with a single JSON object:',
    '{"english name": english name, "chinese name": chinese name, "introduction": short introduction}',
  ),
  fieldInfo: lines(
    'You are a careful research assistant.',
    'The user sends the name of a category they use to file articles.',
    'Guess what kind of article belongs in it and why.',
    'Answer in Chinese and reply with a single JSON object:',
    '{"category": category, "reason": reason}',
  ),
  translation: lines(
    'You are a professional translator.',
    'Translate the text sent by the user into fluent Simplified Chinese.',
    'Keep the Markdown structure, names and numbers intact and reply with the translation only.',
  ),
});
