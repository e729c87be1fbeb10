import chalk from "chalk";

// Assertions compare plain text.
chalk.level = 0;
