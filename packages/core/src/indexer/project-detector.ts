import fileCategories from '../data/file-categories.json';
import type { DirectoryReader } from './directory-reader';

export type FileCategory = keyof typeof fileCategories | 'other';

export type ProjectType =
  | 'nodejs'
  | 'python'
  | 'golang'
  | 'rust'
  | 'java_maven'
  | 'java_gradle'
  | 'terraform'
  | 'git_repo'
  | 'docker'
  | 'general';

export type ProjectProfile = {
  projectType: ProjectType;
  /** True when the root carries a project marker; folder moves are then preferred. */
  isProject: boolean;
  markers: string[];
};

export const PROJECT_MARKERS = new Set([
  '.git',
  'package.json',
  'go.mod',
  'pyproject.toml',
  'main.tf',
  'Cargo.toml',
  'requirements.txt',
  'setup.py',
  'pom.xml',
  'build.gradle',
  'Makefile',
  'CMakeLists.txt',
  'Dockerfile',
  'docker-compose.yml',
]);

function isCategoryName(key: string): key is keyof typeof fileCategories {
  return key in fileCategories;
}

const CATEGORY_ENTRIES = Object.keys(fileCategories)
  .filter(isCategoryName)
  .map((category) => [category, fileCategories[category]] as const);

/**
 * Category of a file from its name; exact names (Dockerfile, .gitignore) win over extensions.
 */
export function categorizeFile(fileName: string): FileCategory {
  const lower = fileName.toLowerCase();
  for (const [category, patterns] of CATEGORY_ENTRIES) {
    if (patterns.includes(lower)) return category;
  }
  for (const [category, patterns] of CATEGORY_ENTRIES) {
    if (patterns.some((pattern) => pattern.startsWith('.') && lower.endsWith(pattern))) {
      return category;
    }
  }
  return 'other';
}

export function classifyProject(rootEntries: readonly string[]): ProjectType {
  const names = new Set(rootEntries);
  const hasTerraform = rootEntries.some((name) => name.endsWith('.tf'));

  if (names.has('.git')) {
    if (names.has('package.json')) return 'nodejs';
    if (names.has('pyproject.toml') || names.has('requirements.txt')) return 'python';
    if (names.has('go.mod')) return 'golang';
    if (names.has('Cargo.toml')) return 'rust';
    if (names.has('pom.xml')) return 'java_maven';
    if (names.has('build.gradle')) return 'java_gradle';
    if (hasTerraform) return 'terraform';
    return 'git_repo';
  }
  if (names.has('Dockerfile')) return 'docker';
  if (hasTerraform) return 'terraform';
  return 'general';
}

/**
 * Inspect the root directory for project markers. An unreadable root is a general folder.
 */
export async function detectProject(rootPath: string, reader: DirectoryReader): Promise<ProjectProfile> {
  try {
    const { files, directories } = await reader.listEntries(rootPath);
    const entries = [...files, ...directories];
    const markers = entries.filter((name) => PROJECT_MARKERS.has(name));
    return {
      projectType: classifyProject(entries),
      isProject: markers.length > 0,
      markers,
    };
  } catch (error) {
    console.warn(`[ProjectDetector] Could not inspect ${rootPath}:`, error);
    return { projectType: 'general', isProject: false, markers: [] };
  }
}
