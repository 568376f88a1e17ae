/**
 * Resume texts shared by the scoring specs
 */

export const EXPERIENCED_RESUME = `Jane Doe
jane.doe@example.com | 555-123-4567 | linkedin.com/in/janedoe | Austin, TX

SUMMARY
Backend engineer who shipped distributed systems and developer tooling.

SKILLS
Python, Java, TypeScript, SQL, React, Node.js, Docker, Kubernetes, AWS, PostgreSQL, Redis, Git, Kafka

EXPERIENCE
Senior Software Engineer, Acme Corp
2021 - Present
• Led migration of billing services to Kubernetes, cutting deploy time by 40%
• Optimized PostgreSQL queries with Python scripts, reducing p95 latency by 35%
• Designed Kafka event pipeline handling 2,000,000 requests per day
Software Engineer, Globex
2018 - 2021
• Built React dashboards in TypeScript used by 500 customers
• Automated CI with Docker and Git hooks, saving 10 hours per week

PROJECTS
Ledger CLI
• Implemented a double-entry ledger in Java with 95% test coverage

Metrics Exporter
• Developed a Redis metrics exporter in Node.js adopted by 3 teams

EDUCATION
B.S. Computer Science, State University, 2014 - 2018

CERTIFICATIONS
AWS Certified Developer, 2020`

export const FRESHER_RESUME = `Alex Kim
alex.kim@example.com | 555-987-6543 | linkedin.com/in/alexkim | Denver, CO

SUMMARY
Computer science student building web applications and data tools.

SKILLS
Python, React, SQL

PROJECTS
Campus Events App
• Built a React app for browsing campus events with Python backend
• Designed SQL schema for event listings and registrations

Budget Tracker
• Developed expense tracking tool that reduced manual entry time by 30%

EDUCATION
B.S. Computer Science, Mountain University, 2022 - Present
Dean's List, 2023`

export const FRESHER_SINGLE_PROJECT_RESUME = `Alex Kim
alex.kim@example.com | 555-987-6543 | linkedin.com/in/alexkim | Denver, CO

SUMMARY
Computer science student building web applications and data tools.

SKILLS
Python, React, SQL

PROJECTS
Campus Events App
• Built a React app for browsing campus events with Python backend
• Designed SQL schema for event listings and registrations

EDUCATION
B.S. Computer Science, Mountain University, 2022 - Present
Dean's List, 2023`

export const SHORT_NOTE = 'Motivated graduate seeking an entry level role in software development, eager to learn cloud platforms quickly.'
