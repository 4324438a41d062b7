/**
 * README prompt assembly
 *
 * The context is built from the analysis in a fixed order: summary, file list,
 * then key-file snippets. Snippets are appended only while the context fits
 * within the character budget.
 */

import { RepositoryAnalysis } from '../analysis/types.js';

export const MAX_LISTED_FILES = 20;
export const MAX_SNIPPET_FILES = 5;
export const MAX_SNIPPET_CHARS = 1000;

const IMPORTANT_NAME_HINTS = ['main', 'index', 'app', 'server', '__init__', 'setup', 'config'];
const IMPORTANT_CONTENT_HINTS = [
  'argparse',
  'os.getenv',
  'process.env',
  'api_key',
  'api key',
  'secret_key',
];

export const README_SYSTEM_PROMPT =
  'You are an expert technical writer and software developer. Generate comprehensive, professional README files that are clear, well-structured, and include all necessary information for users to understand and use the project.';

export interface ReadmeContext {
  text: string;
  listedFiles: string[];
  snippetFiles: string[];
  /** Snippets that matched but did not fit the budget */
  droppedSnippets: string[];
}

/**
 * Pick entry points, config files and files that read keys or CLI arguments.
 * Only the listed sample is considered.
 */
export function selectImportantFiles(
  analysis: RepositoryAnalysis,
  candidates: string[],
): string[] {
  const important: string[] = [];
  for (const filePath of candidates) {
    const lowerPath = filePath.toLowerCase();
    if (IMPORTANT_NAME_HINTS.some((hint) => lowerPath.includes(hint))) {
      important.push(filePath);
      continue;
    }
    const sample = (analysis.files[filePath]?.content ?? '').slice(0, 1000).toLowerCase();
    if (IMPORTANT_CONTENT_HINTS.some((hint) => sample.includes(hint))) {
      important.push(filePath);
    }
  }
  return [...new Set(important)].slice(0, MAX_SNIPPET_FILES);
}

function summaryBlock(analysis: RepositoryAnalysis): string {
  const stack = [...new Set([...analysis.frameworks, ...analysis.technologies])];
  return `
Repository Analysis:
- Name: ${analysis.repoName}
- Total Files: ${analysis.totalFiles}
- Total Lines of Code: ${analysis.totalLines}
- Languages: ${analysis.languages.join(', ')}
- Frameworks/Technologies: ${stack.join(', ')}
- Project Type: ${analysis.projectType}
- Configuration files: ${analysis.configFiles.join(', ')}

File Structure (sample):
`;
}

export function buildReadmeContext(analysis: RepositoryAnalysis, maxChars: number): ReadmeContext {
  const allFiles = Object.keys(analysis.files);
  const listedFiles = allFiles.slice(0, MAX_LISTED_FILES);

  let text = summaryBlock(analysis);
  for (const filePath of listedFiles) {
    text += `- ${filePath} (${analysis.files[filePath].lines} lines)\n`;
  }
  if (allFiles.length > MAX_LISTED_FILES) {
    text += `... and ${allFiles.length - MAX_LISTED_FILES} more files\n`;
  }

  text += '\nKey File Contents (snippets):\n';

  const snippetFiles: string[] = [];
  const droppedSnippets: string[] = [];
  const important = selectImportantFiles(analysis, listedFiles);

  for (let i = 0; i < important.length; i += 1) {
    const filePath = important[i];
    const content = analysis.files[filePath].content.slice(0, MAX_SNIPPET_CHARS);
    const snippet = `\n--- ${filePath} ---\n${content}...\n`;
    if (text.length + snippet.length > maxChars) {
      droppedSnippets.push(...important.slice(i));
      break;
    }
    text += snippet;
    snippetFiles.push(filePath);
  }

  return { text, listedFiles, snippetFiles, droppedSnippets };
}

export function buildReadmePrompt(context: string): string {
  return `
Based on the following repository analysis, generate a comprehensive README.md file that includes:

1. **Project Title and Description**: Clear, engaging description of what the project does
2. **Features**: Key features and capabilities
3. **Technology Stack**: Languages, frameworks, and tools used
4. **Prerequisites**: System requirements, dependencies, and **any API keys or environment variables needed**. Look for clues like \`os.getenv\`, \`process.env\`, \`argparse\`, or variable names like \`API_KEY\`.
5. **Installation**: Step-by-step setup instructions IF ANY REQUIRED
6. **Usage**: How to run and use the project with examples. Include command-line arguments if found.
7. **Project Structure**: Overview of the codebase organization
8. **Configuration**: Any environment variables or config files needed
9. **API Documentation**: If applicable, document key endpoints or functions IF ANY PRESENT
10. **Contributing**: Guidelines for contributors
11. **License**: License information IF ALREADY MENTIONED
12. **Contact**: Author/maintainer information IF ALREADY MENTIONED

Make the README professional, well-formatted with proper markdown, and comprehensive enough that someone can understand and set up the project from scratch.
Pay close attention to the code snippets to find requirements like API keys or specific commands to run the project.

Repository Analysis:
${context}

Generate a complete README.md file:
`;
}
