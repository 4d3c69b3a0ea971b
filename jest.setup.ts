// Keep test output quiet unless a run asks for logs explicitly.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent'
