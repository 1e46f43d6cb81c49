import 'dotenv/config'
import { buildProgram } from '@/cli/program'

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('❌ Error processing data:', error)
    process.exit(1)
  })
