import { Router } from 'express'
import multer from 'multer'
import { createUploadController, isTextFile, isWorkbookFile, UploadControllerDeps } from '../controllers/uploadController'
import { UnsupportedFileError } from '../middleware/errorHandler'
import { validateUploadQuery } from '../middleware/validate'

interface UploadRouterOptions extends UploadControllerDeps {
  uploadLimitMb: number
}

export const createUploadRouter = ({ uploadLimitMb, ...deps }: UploadRouterOptions): Router => {
  const router = Router()
  const { uploadFiles, exportWorkbook } = createUploadController(deps)

  const storage = multer.memoryStorage()
  const upload = multer({
    storage,
    limits: { fileSize: uploadLimitMb * 1024 * 1024 },
    fileFilter: (_req, file, cb) => {
      if (isWorkbookFile(file) || isTextFile(file)) {
        cb(null, true)
      } else {
        cb(new UnsupportedFileError('Invalid file type. Only .xlsx workbooks and plain text files are allowed.'))
      }
    },
  })

  router.post('/', validateUploadQuery, upload.array('files', 10), uploadFiles)
  router.post('/export', validateUploadQuery, upload.single('file'), exportWorkbook)

  return router
}
