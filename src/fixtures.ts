export type FixtureFormat = 'python' | 'rust' | 'json' | 'svg' | 'png' | 'notebook';

export interface FixtureFile {
  readonly name: string;
  readonly format: FixtureFormat;
  readonly content: string | Buffer;
}

export interface FixtureConfig {
  app_name: string;
  version: string;
  features: {
    image_analysis: boolean;
    pdf_processing: boolean;
    svg_rendering: boolean;
    notebook_analysis: boolean;
  };
  supported_formats: string[];
}

export interface StreamOutput {
  name: 'stdout' | 'stderr';
  output_type: 'stream';
  text: string[];
}

export interface MarkdownCell {
  cell_type: 'markdown';
  metadata: Record<string, unknown>;
  source: string[];
}

export interface CodeCell {
  cell_type: 'code';
  execution_count: number | null;
  metadata: Record<string, unknown>;
  outputs: StreamOutput[];
  source: string[];
}

export type NotebookCell = MarkdownCell | CodeCell;

export interface NotebookDocument {
  cells: NotebookCell[];
  metadata: {
    kernelspec: { display_name: string; language: string; name: string };
    language_info: { name: string; version: string };
  };
  nbformat: number;
  nbformat_minor: number;
}

const PYTHON_SOURCE = `#!/usr/bin/env python3
def fibonacci(n):
    """Return the n-th Fibonacci number."""
    if n <= 1:
        return n
    return fibonacci(n - 1) + fibonacci(n - 2)

if __name__ == "__main__":
    for i in range(10):
        print(f"fib({i}) = {fibonacci(i)}")
`;

const RUST_SOURCE = `//! Sample Rust program for the read tool.
//! Declares a record type and prints a few instances.

use std::collections::HashMap;

/// A registered user.
#[derive(Debug, Clone)]
pub struct User {
    pub id: u64,
    pub name: String,
    pub email: String,
}

impl User {
    /// Builds a new user.
    pub fn new(id: u64, name: String, email: String) -> Self {
        Self { id, name, email }
    }
}

fn main() {
    let mut users = HashMap::new();
    users.insert(1, User::new(1, "Alice".to_string(), "alice@example.com".to_string()));
    users.insert(2, User::new(2, "Bob".to_string(), "bob@example.com".to_string()));

    println!("Users:");
    for (id, user) in &users {
        println!("  {}: {} <{}>", id, user.name, user.email);
    }
}
`;

export const CONFIG: FixtureConfig = {
  app_name: 'MultiModal Reader Test',
  version: '1.0.0',
  features: {
    image_analysis: true,
    pdf_processing: true,
    svg_rendering: true,
    notebook_analysis: true,
  },
  supported_formats: [
    'png', 'jpg', 'jpeg', 'gif', 'webp',
    'pdf', 'svg', 'ipynb',
    'py', 'rs', 'js', 'ts', 'json', 'yaml', 'md',
  ],
};

const SVG_SOURCE = `<?xml version="1.0" encoding="UTF-8"?>
<svg width="200" height="200" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <linearGradient id="grad1" x1="0%" y1="0%" x2="100%" y2="100%">
      <stop offset="0%" style="stop-color:rgb(255,255,0);stop-opacity:1" />
      <stop offset="100%" style="stop-color:rgb(255,0,0);stop-opacity:1" />
    </linearGradient>
  </defs>

  <!-- background -->
  <rect width="200" height="200" fill="url(#grad1)" />

  <circle cx="100" cy="100" r="50" fill="blue" opacity="0.7" />

  <text x="100" y="105" font-family="Arial" font-size="16" fill="white" text-anchor="middle">
    AI Analysis
  </text>

  <!-- arrow -->
  <path d="M 50 150 L 100 120 L 150 150" stroke="black" stroke-width="3" fill="none" />
  <polygon points="100,115 105,125 95,125" fill="black" />
</svg>`;

export const NOTEBOOK: NotebookDocument = {
  cells: [
    {
      cell_type: 'markdown',
      metadata: {},
      source: [
        '# Data analysis sample\n',
        '\n',
        'This notebook mixes narrative, code and recorded output.\n',
      ],
    },
    {
      cell_type: 'code',
      execution_count: 1,
      metadata: {},
      outputs: [
        {
          name: 'stdout',
          output_type: 'stream',
          text: ['Data loaded\n', 'Samples: 1000\n'],
        },
      ],
      source: [
        'import pandas as pd\n',
        'import numpy as np\n',
        'import matplotlib.pyplot as plt\n',
        '\n',
        '# sample data\n',
        'np.random.seed(42)\n',
        'data = pd.DataFrame({\n',
        "    'x': np.random.randn(1000),\n",
        "    'y': np.random.randn(1000) * 2 + 1\n",
        '})\n',
        '\n',
        'print("Data loaded")\n',
        'print(f"Samples: {len(data)}")',
      ],
    },
    {
      cell_type: 'code',
      execution_count: 2,
      metadata: {},
      outputs: [],
      source: [
        '# scatter plot\n',
        'plt.figure(figsize=(10, 6))\n',
        "plt.scatter(data['x'], data['y'], alpha=0.6)\n",
        "plt.xlabel('x')\n",
        "plt.ylabel('y')\n",
        "plt.title('Scatter')\n",
        'plt.grid(True, alpha=0.3)\n',
        'plt.show()',
      ],
    },
  ],
  metadata: {
    kernelspec: {
      display_name: 'Python 3',
      language: 'python',
      name: 'python3',
    },
    language_info: {
      name: 'python',
      version: '3.8.5',
    },
  },
  nbformat: 4,
  nbformat_minor: 4,
};

// 1x1 RGBA
const PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

/**
 * Files written into every workspace, in the order they are written.
 */
export const FIXTURES: readonly FixtureFile[] = [
  { name: 'example.py', format: 'python', content: PYTHON_SOURCE },
  { name: 'example.rs', format: 'rust', content: RUST_SOURCE },
  { name: 'config.json', format: 'json', content: JSON.stringify(CONFIG, null, 2) },
  { name: 'diagram.svg', format: 'svg', content: SVG_SOURCE },
  { name: 'analysis.ipynb', format: 'notebook', content: JSON.stringify(NOTEBOOK, null, 2) },
  { name: 'pixel.png', format: 'png', content: Buffer.from(PNG_BASE64, 'base64') },
];

/**
 * Size on disk of a fixture once written (strings are written as UTF-8)
 */
export function fixtureBytes(fixture: FixtureFile): number {
  return typeof fixture.content === 'string'
    ? Buffer.byteLength(fixture.content, 'utf8')
    : fixture.content.length;
}
